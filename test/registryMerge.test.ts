import { strict as assert } from "assert";
import fs from "fs";
import path from "path";
import { describe, it } from "node:test";
import { parseCsvText, readCsvFile } from "../ingest/csvIngest";
import { createMemoryLogger } from "../logging/logger";
import { ValidationError } from "../schema/errors";
import { mergeRegistryWithPkas, readFilterIds } from "../transform/registryMerge";

const DATA = path.join(__dirname, "data");
const registry = () => readCsvFile(path.join(DATA, "registry.csv"));
const longPkas = () => readCsvFile(path.join(DATA, "pkas_long.csv"));

describe("mergeRegistryWithPkas", () => {
  it("joins on id, derives batch_sample and drops rows without pKas", () => {
    const logger = createMemoryLogger();
    const { table, dropped } = mergeRegistryWithPkas(registry(), longPkas(), logger);

    assert.deepEqual(table.columns, [
      "ID", "Registry Number", "Batch Name", "Well", "MW", "fw", "mg", "batch_sample", "reformatted_pkas",
    ]);
    assert.deepEqual(
      table.rows.map((r) => [r.ID, r.batch_sample, r.reformatted_pkas]),
      [
        ["C-001", "REG100-B01", "ACID,2.05,BASE,6.75"],
        ["C-002", "REG200-B02", "ACID,4.4"],
      ]
    );
    assert.deepEqual(dropped, ["C-003"]);
    assert.ok(
      logger.entries.some(
        (e) => e.level === "warn" && e.message === "1 rows have missing pKa data and will be dropped: C-003"
      )
    );
  });

  it("uses a short pKa table as is, with custom id columns", () => {
    const reg = parseCsvText(
      "CompoundID,Registry Number,Batch Name,Well,MW\nX1,R1,B1,A1,100\n",
      "reg.csv"
    );
    const pkas = parseCsvText("cid,reformatted_pkas\nX1,\"BASE,7.5\"\n", "short.csv");
    const { table } = mergeRegistryWithPkas(reg, pkas, createMemoryLogger(), {
      registryIdColumn: "CompoundID",
      pkaIdColumn: "cid",
    });
    assert.deepEqual(table.rows, [
      {
        CompoundID: "X1",
        "Registry Number": "R1",
        "Batch Name": "B1",
        Well: "A1",
        MW: "100",
        batch_sample: "R1-B1",
        reformatted_pkas: "BASE,7.5",
      },
    ]);
  });

  it("emits one row per duplicate pKa entry", () => {
    const pkas = parseCsvText('vendor_id,reformatted_pkas\nC-001,"BASE,7"\nC-001,"ACID,3"\n', "dup.csv");
    const logger = createMemoryLogger();
    const { table } = mergeRegistryWithPkas(registry(), pkas, logger);
    assert.deepEqual(
      table.rows.map((r) => r.reformatted_pkas),
      ["BASE,7", "ACID,3"]
    );
    assert.ok(logger.entries.some((e) => e.message === "C-001 has 2 pKa entries; each becomes its own sample row"));
  });

  it("keeps only filtered ids", () => {
    const { table } = mergeRegistryWithPkas(registry(), longPkas(), createMemoryLogger(), {
      filterIds: new Set(["C-002"]),
    });
    assert.deepEqual(
      table.rows.map((r) => r.ID),
      ["C-002"]
    );
  });

  it("keeps an existing batch_sample column", () => {
    const reg = parseCsvText(
      "ID,Registry Number,Batch Name,Well,MW,batch_sample\nC-001,R,B,A1,1,custom-name\n",
      "reg.csv"
    );
    const { table } = mergeRegistryWithPkas(reg, longPkas(), createMemoryLogger());
    assert.equal(table.rows[0].batch_sample, "custom-name");
  });

  it("rejects a registry without the required columns", () => {
    const reg = parseCsvText("ID,Registry Number,Batch Name,Well\nC-001,R,B,A1\n", "registry.csv");
    assert.throws(() => mergeRegistryWithPkas(reg, longPkas(), createMemoryLogger()), {
      message: 'registry.csv: missing required column(s): "MW"',
    });
  });

  it("reads a registry file from disk", () => {
    assert.ok(fs.existsSync(path.join(DATA, "registry.csv")));
    assert.equal(registry().rows.length, 3);
  });
});

describe("readFilterIds", () => {
  it("uses the id column when present, else the first column", () => {
    assert.deepEqual(
      [...readFilterIds(parseCsvText("Name,ID\nx,C-001\ny, C-002 \n", "f.csv"))],
      ["C-001", "C-002"]
    );
    assert.deepEqual(
      [...readFilterIds(parseCsvText("compound\nC-003\n\n", "f.csv"))],
      ["C-003"]
    );
  });

  it("rejects an empty filter file", () => {
    assert.throws(() => readFilterIds(parseCsvText("", "f.csv")), ValidationError);
  });
});
