import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";

import { Error as CfgError } from "../cfg/errors.js";
import { Error as ParseError } from "../parser/errors.js";
import { Error as ResolveError } from "../resolver/errors.js";
import { Error as TypeError } from "../typechecker/errors.js";

import { handleCompileCommand } from "./compile.js";
import { formatJson } from "./formatters.js";
import { parseOptions, usage } from "./options.js";
import { errorSummary } from "./output.js";

describe("parseOptions", () => {
  it("fills in defaults", () => {
    expect(parseOptions(["a.pvl"])).toEqual({
      file: "a.pvl",
      overlookResolutionErrors: false,
      extractLoops: false,
      print: false,
      format: "text",
    });
  });

  it("reads flags", () => {
    expect(
      parseOptions([
        "--overlook-errors",
        "--extract-loops",
        "--print",
        "--format",
        "json",
        "a.pvl",
      ]),
    ).toEqual({
      file: "a.pvl",
      overlookResolutionErrors: true,
      extractLoops: true,
      print: true,
      format: "json",
    });
  });

  it("returns null for help", () => {
    expect(parseOptions(["-h"])).toBeNull();
  });

  it("rejects unknown formats and missing files", () => {
    expect(() => parseOptions(["--format", "xml", "a.pvl"])).toThrow(
      "Unknown format: xml. Expected text or json",
    );
    expect(() => parseOptions([])).toThrow("Expected exactly one input file");
    expect(() => parseOptions(["a.pvl", "b.pvl"])).toThrow(
      "Expected exactly one input file",
    );
  });
});

describe("errorSummary", () => {
  const at = { offset: 0, length: 0 };

  it("names the gate that failed", () => {
    expect(errorSummary([new ParseError("bad", at)], "a.pvl")).toBe(
      "1 parse errors detected in a.pvl",
    );
    expect(
      errorSummary([new ResolveError("x"), new ResolveError("y")], "a.pvl"),
    ).toBe("2 name resolution errors detected in a.pvl");
    expect(errorSummary([new TypeError("x")], "a.pvl")).toBe(
      "1 type checking errors detected in a.pvl",
    );
    expect(errorSummary([new CfgError("x")], "a.pvl")).toBe(
      "1 loop extraction errors detected in a.pvl",
    );
  });
});

describe("formatJson", () => {
  it("adds line and column where the message has a location", () => {
    const source = "var x: int;\naxiom y;";
    const messages = [
      new ResolveError("undeclared identifier: y", { offset: 18, length: 1 }),
      new TypeError("somewhere"),
    ];
    expect(JSON.parse(formatJson(messages, source, "a.pvl"))).toEqual([
      {
        severity: "error",
        code: "RES020",
        message: "undeclared identifier: y",
        file: "a.pvl",
        line: 2,
        column: 7,
      },
      {
        severity: "error",
        code: "TYP018",
        message: "somewhere",
        file: "a.pvl",
      },
    ]);
  });
});

describe("handleCompileCommand", () => {
  let directory: string;
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), "pvl-cli-"));
  });

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true });
    log.mockRestore();
    error.mockRestore();
  });

  afterEach(() => {
    log.mockClear();
    error.mockClear();
  });

  function write(name: string, source: string): string {
    const file = join(directory, name);
    writeFileSync(file, source);
    return file;
  }

  it("prints usage for help", async () => {
    expect(await handleCompileCommand(["--help"])).toBe(0);
    expect(log).toHaveBeenCalledWith(usage);
  });

  it("prints the checked program", async () => {
    const file = write("ok.pvl", "var g: int;");
    expect(await handleCompileCommand(["--print", file])).toBe(0);
    expect(log.mock.calls).toEqual([["var g: int;\n"]]);
    expect(error).not.toHaveBeenCalled();
  });

  it("reports errors with positions and a summary", async () => {
    const file = write("bad.pvl", "axiom y;");
    expect(await handleCompileCommand([file])).toBe(1);
    expect(error.mock.calls).toEqual([
      [`${file}(1,7): undeclared identifier: y`],
      [`1 name resolution errors detected in ${file}`],
    ]);
  });

  it("reports errors as json", async () => {
    const file = write("bad-json.pvl", "axiom y;");
    expect(await handleCompileCommand(["--format", "json", file])).toBe(1);
    expect(log).toHaveBeenCalledTimes(1);
    const [[text]] = log.mock.calls;
    expect(JSON.parse(String(text))).toEqual([
      {
        severity: "error",
        code: "RES005",
        message: "undeclared identifier: y",
        file,
        line: 1,
        column: 7,
      },
    ]);
  });

  it("drops unresolvable implementations when asked to", async () => {
    const file = write(
      "overlook.pvl",
      "procedure P();\nimplementation P() { assume z; }",
    );
    expect(await handleCompileCommand(["--overlook-errors", file])).toBe(0);
    expect(error.mock.calls).toEqual([
      [
        `${file}(2,1): Ignoring implementation P because of translation resolution errors`,
      ],
    ]);
  });
});
