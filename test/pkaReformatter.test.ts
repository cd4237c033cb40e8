import { strict as assert } from "assert";
import { describe, it } from "node:test";
import { parseCsvText } from "../ingest/csvIngest";
import { ValidationError } from "../schema/errors";
import { convertLongPkaTable } from "../transform/pkaReformatter";

describe("convertLongPkaTable", () => {
  it("groups by compound and orders pKas by value", () => {
    const table = parseCsvText(
      "vendor_id,pka_type,pka_value\nC-002,Acid,4.4\nC-001,base,6.75\nC-001,acid,2.05\n",
      "long.csv"
    );
    const short = convertLongPkaTable(table);
    assert.deepEqual(short.columns, ["vendor_id", "reformatted_pkas"]);
    assert.deepEqual(short.rows, [
      { vendor_id: "C-001", reformatted_pkas: "ACID,2.05,BASE,6.75" },
      { vendor_id: "C-002", reformatted_pkas: "ACID,4.4" },
    ]);
  });

  it("honours custom column names", () => {
    const table = parseCsvText("cid,kind,val\nX,base,9\n", "custom.csv");
    const short = convertLongPkaTable(table, { id: "cid", pkaType: "kind", pkaValue: "val", output: "pkas" });
    assert.deepEqual(short.rows, [{ cid: "X", pkas: "BASE,9.0" }]);
  });

  it("keeps one decimal on integral values", () => {
    const table = parseCsvText("vendor_id,pka_type,pka_value\nC-001,acid,6.0\nC-001,base,10\n", "long.csv");
    assert.deepEqual(convertLongPkaTable(table).rows, [
      { vendor_id: "C-001", reformatted_pkas: "ACID,6.0,BASE,10.0" },
    ]);
  });

  it("reports missing columns", () => {
    const table = parseCsvText("vendor_id,pka_value\nC-001,3\n", "long.csv");
    assert.throws(() => convertLongPkaTable(table), {
      message: 'long.csv: missing required column(s): "pka_type"',
    });
  });

  it("reports every bad row", () => {
    const table = parseCsvText(
      "vendor_id,pka_type,pka_value\nC-001,neutral,3\nC-002,acid,abc\n",
      "long.csv"
    );
    assert.throws(
      () => convertLongPkaTable(table),
      (err: unknown) =>
        err instanceof ValidationError &&
        /row 1 pkaType: /.test(err.message) &&
        /row 2 pkaValue: must be numeric/.test(err.message)
    );
  });
});

describe("parseCsvText", () => {
  it("trims headers and fills short rows", () => {
    const table = parseCsvText(" ID , Name\nA1\n", "t.csv");
    assert.deepEqual(table.columns, ["ID", "Name"]);
    assert.deepEqual(table.rows, [{ ID: "A1", Name: "" }]);
  });

  it("keeps a single column table", () => {
    const table = parseCsvText("ID\nC-001\nC-002\n", "filter.csv");
    assert.deepEqual(table.rows, [{ ID: "C-001" }, { ID: "C-002" }]);
  });

  it("rejects rows with extra cells", () => {
    assert.throws(() => parseCsvText("a,b\n1,2,3\n", "bad.csv"), ValidationError);
  });
});
