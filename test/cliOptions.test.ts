import { strict as assert } from "assert";
import { describe, it } from "node:test";
import { parseArgs } from "../cli/options";
import { UsageError } from "../schema/errors";

describe("parseArgs", () => {
  it("shows help without arguments or with --help", () => {
    assert.deepEqual(parseArgs([]), { command: "help" });
    assert.deepEqual(parseArgs(["gencsv", "--help"]), { command: "help" });
  });

  it("parses extract", () => {
    assert.deepEqual(parseArgs(["extract", "./results", "--protocol", "PKA", "--output", "out/pkas.csv"]), {
      command: "extract",
      inputPath: "./results",
      protocol: "pka",
      output: "out/pkas.csv",
    });
    assert.deepEqual(parseArgs(["extract", "--protocol=logp", "one.t3r"]), {
      command: "extract",
      inputPath: "one.t3r",
      protocol: "logp",
      output: null,
    });
  });

  it("rejects bad extract arguments", () => {
    assert.throws(() => parseArgs(["extract", "./results"]), {
      message: "Missing required option --protocol",
    });
    assert.throws(() => parseArgs(["extract", "./results", "--protocol", "solubility"]), {
      message: '--protocol must be pka or logp (got "solubility")',
    });
    assert.throws(() => parseArgs(["extract", "a", "b", "--protocol", "pka"]), UsageError);
    assert.throws(() => parseArgs(["extract", "a", "--protocol"]), {
      message: "Option --protocol needs a value",
    });
    assert.throws(() => parseArgs(["extract", "a", "--protocol", "pka", "--verbose", "x"]), {
      message: "Unknown option --verbose",
    });
  });

  it("parses gencsv with defaults", () => {
    assert.deepEqual(
      parseArgs(["gencsv", "--regi", "r.csv", "--pka", "p.csv", "--output", "plate", "--protocol", "fast-uv-pska"]),
      {
        command: "gencsv",
        regi: "r.csv",
        pka: "p.csv",
        output: "plate",
        protocol: "fast-uv-pska",
        filterFile: null,
        regiIdCol: "ID",
        pkaIdCol: "vendor_id",
        sampleCol: "batch_sample",
        concentrationMm: 10,
        volumeUl: 5,
        logpSolvent: null,
      }
    );
  });

  it("parses gencsv overrides", () => {
    const opts = parseArgs([
      "gencsv", "--regi", "r.csv", "--pka", "p.csv", "--output", "plate",
      "--protocol", "LogP", "--logp-solvent", "Octanol", "--filter-file", "f.csv",
      "--regi-id-col", "CompoundID", "--pka-id-col", "cid", "--sample-col", "ID",
      "--concentration", "20", "--volume", "2.5",
    ]);
    assert.equal(opts.command, "gencsv");
    if (opts.command !== "gencsv") return;
    assert.equal(opts.protocol, "logp");
    assert.equal(opts.logpSolvent, "octanol");
    assert.equal(opts.filterFile, "f.csv");
    assert.equal(opts.regiIdCol, "CompoundID");
    assert.equal(opts.pkaIdCol, "cid");
    assert.equal(opts.sampleCol, "ID");
    assert.equal(opts.concentrationMm, 20);
    assert.equal(opts.volumeUl, 2.5);
  });

  it("rejects bad gencsv arguments", () => {
    const base = ["gencsv", "--regi", "r.csv", "--pka", "p.csv", "--output", "plate"];
    assert.throws(() => parseArgs([...base, "--protocol", "logp"]), {
      message: "--logp-solvent is required when --protocol is logp",
    });
    assert.throws(() => parseArgs([...base, "--protocol", "logp", "--logp-solvent", "water"]), UsageError);
    assert.throws(() => parseArgs([...base, "--protocol", "hplc"]), UsageError);
    assert.throws(() => parseArgs([...base, "--protocol", "uv-metric-pska", "--volume", "-1"]), {
      message: '--volume must be a positive number (got "-1")',
    });
    assert.throws(() => parseArgs(["gencsv", "--protocol", "uv-metric-pska"]), {
      message: "Missing required option --regi",
    });
  });

  it("rejects an unknown command", () => {
    assert.throws(() => parseArgs(["convert"]), {
      name: "UsageError",
      message: 'Unknown command "convert". Use "extract" or "gencsv".',
    });
  });
});
