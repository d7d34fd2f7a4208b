import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@pltools/core/errors";
import { parseCliArgs, parseMaxPrefixLength } from "./args.js";

describe("parseMaxPrefixLength", () => {
  it('accepts "29" and "/29"', () => {
    expect(parseMaxPrefixLength("29")).toBe(29);
    expect(parseMaxPrefixLength("/29")).toBe(29);
    expect(parseMaxPrefixLength("0")).toBe(0);
    expect(parseMaxPrefixLength("/32")).toBe(32);
  });

  it.each(["abc", "33", "-1", "29.5", "", "/"])(
    'rejects "%s" as a configuration error',
    (value) => {
      expect(() => parseMaxPrefixLength(value)).toThrow(ConfigurationError);
    },
  );
});

describe("parseCliArgs", () => {
  it("returns help without arguments or with --help", () => {
    expect(parseCliArgs([])).toEqual({ command: "help" });
    expect(parseCliArgs(["--help"])).toEqual({ command: "help" });
    expect(parseCliArgs(["audit", "-h"])).toEqual({
      command: "help",
      topic: "audit",
    });
  });

  it("parses audit with filters and a threshold", () => {
    expect(
      parseCliArgs([
        "audit",
        "--maxcidr",
        "/24",
        "--plfilter",
        "vendor",
        "--plexclude",
        "old",
        "--region",
        "eu-west-1",
        "-q",
      ]),
    ).toEqual({
      command: "audit",
      maxPrefixLength: 24,
      options: {
        nameInclude: "vendor",
        nameExclude: "old",
        profile: undefined,
        region: "eu-west-1",
        configPath: undefined,
        quiet: true,
        exportTarget: { kind: "disabled" },
      },
    });
  });

  it("leaves the audit threshold to config when omitted", () => {
    const parsed = parseCliArgs(["audit"]);
    expect(parsed).not.toHaveProperty("maxPrefixLength");
  });

  it("maps --name and --ip to search criteria", () => {
    expect(parseCliArgs(["search", "--name", "vendor"])).toMatchObject({
      command: "search",
      criteria: { field: "description", term: "vendor" },
    });
    expect(parseCliArgs(["search", "--ip", "10.0"])).toMatchObject({
      command: "search",
      criteria: { field: "address", term: "10.0" },
    });
  });

  it("requires exactly one search term", () => {
    expect(() => parseCliArgs(["search"])).toThrow(
      "Specify exactly one of --name or --ip",
    );
    expect(() =>
      parseCliArgs(["search", "--name", "a", "--ip", "10.0"]),
    ).toThrow(ConfigurationError);
  });

  it("turns the csv flags into an export target", () => {
    expect(parseCliArgs(["list"])).toMatchObject({
      options: { exportTarget: { kind: "disabled" } },
    });
    expect(parseCliArgs(["list", "--csv"])).toMatchObject({
      options: { exportTarget: { kind: "default-name" } },
    });
    expect(parseCliArgs(["list", "--csv-file", "pls.csv"])).toMatchObject({
      options: { exportTarget: { kind: "named", filename: "pls.csv" } },
    });
    expect(
      parseCliArgs(["list", "--csv", "--csv-file", "pls.csv"]),
    ).toMatchObject({
      options: { exportTarget: { kind: "named", filename: "pls.csv" } },
    });
  });

  it("rejects unknown commands and options", () => {
    expect(() => parseCliArgs(["delete"])).toThrow('Unknown command "delete"');
    expect(() => parseCliArgs(["list", "--maxcidr", "29"])).toThrow(
      ConfigurationError,
    );
    expect(() => parseCliArgs(["list", "extra"])).toThrow(ConfigurationError);
  });
});
