import { describe, it, expect } from "vitest";
import {
  buildListing,
  collectMatches,
  buildDetailReport,
  toReportRows,
  listingRows,
} from "./aggregate.js";
import { filterOversizedEntries } from "../filters/cidr.js";
import { searchEntries } from "../filters/search.js";
import { createInMemorySource } from "../test-utils/source.js";
import { createCaptureLogger } from "../test-utils/logger.js";
import type { ListMatches, PrefixList } from "../schemas/prefix-list.js";

const ACCOUNT = "111111111111";

const LISTS: PrefixList[] = [
  { id: "pl-001", name: "VendorPL", owner: ACCOUNT },
  { id: "pl-002", name: "RemovedPL", owner: ACCOUNT },
  { id: "pl-003", name: "OfficePL", owner: ACCOUNT },
  { id: "pl-004", name: "EmptyPL", owner: ACCOUNT },
];

function makeSource() {
  return createInMemorySource({
    accountId: ACCOUNT,
    lists: LISTS,
    entries: {
      "pl-001": [
        { block: "10.0.0.0/24", description: "Vendor uplink" },
        { block: "10.0.1.0/30", description: "Vendor mgmt" },
      ],
      // pl-002 was deleted between enumeration and entry fetch
      "pl-003": [{ block: "192.168.0.0/16", description: "Office LAN" }],
      "pl-004": [],
    },
  });
}

describe("buildListing", () => {
  it("sorts by name case-insensitively", () => {
    const listing = buildListing([
      { id: "pl-b", name: "BetaPL" },
      { id: "pl-a", name: "AlphaPL" },
      { id: "pl-d", name: "DeprecatedPL" },
    ]);

    expect([...listing.values()]).toEqual(["AlphaPL", "BetaPL", "DeprecatedPL"]);
    expect([...listing.keys()]).toEqual(["pl-a", "pl-b", "pl-d"]);
  });

  it("keeps fetch order for names equal ignoring case", () => {
    const listing = buildListing([
      { id: "pl-2", name: "shared" },
      { id: "pl-1", name: "Shared" },
      { id: "pl-0", name: "apps" },
    ]);

    expect([...listing]).toEqual([
      ["pl-0", "apps"],
      ["pl-2", "shared"],
      ["pl-1", "Shared"],
    ]);
  });

  it('lists a missing name as "N/A"', () => {
    expect([...buildListing([{ id: "pl-x" }])]).toEqual([["pl-x", "N/A"]]);
  });
});

describe("collectMatches", () => {
  it("processes lists in order and survives a failed entry fetch", async () => {
    const source = makeSource();
    const { logger, records } = createCaptureLogger();

    const result = await collectMatches(
      source,
      LISTS,
      (entries) => filterOversizedEntries(entries, { maxPrefixLength: 29 }),
      logger,
    );

    expect(source.fetched).toEqual(["pl-001", "pl-002", "pl-003", "pl-004"]);
    expect(result.matches.map((m) => [m.list.id, m.entries.length])).toEqual([
      ["pl-001", 1],
      ["pl-002", 0],
      ["pl-003", 1],
      ["pl-004", 0],
    ]);
    expect(result.diagnostics).toEqual([
      {
        errorCode: "ENTRY_FETCH_FAILED",
        listId: "pl-002",
        message:
          "Error retrieving entries for pl-002: The prefix list ID 'pl-002' does not exist",
      },
    ]);

    const errors = records.filter((r) => r.level === 50);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ listId: "pl-002" });
  });

  it("keeps going past a list holding a malformed block", async () => {
    const lists: PrefixList[] = [
      { id: "pl-a", name: "TypoPL", owner: ACCOUNT },
      { id: "pl-b", name: "GoodPL", owner: ACCOUNT },
    ];
    const source = createInMemorySource({
      accountId: ACCOUNT,
      lists,
      entries: {
        "pl-a": [{ block: "10.0.0.0/8/24", description: "double prefix" }],
        "pl-b": [{ block: "172.16.0.0/12", description: "Campus" }],
      },
    });

    const result = await collectMatches(source, lists, (entries) =>
      filterOversizedEntries(entries, { maxPrefixLength: 29 }),
    );

    expect(source.fetched).toEqual(["pl-a", "pl-b"]);
    expect(result.matches).toEqual([
      { list: { id: "pl-a", name: "TypoPL", owner: ACCOUNT }, entries: [] },
      {
        list: { id: "pl-b", name: "GoodPL", owner: ACCOUNT },
        entries: [{ block: "172.16.0.0/12", description: "Campus" }],
      },
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it("passes each list to the selector", async () => {
    const seen: string[] = [];

    await collectMatches(makeSource(), LISTS, (entries, list) => {
      seen.push(list.id);
      return entries;
    });

    expect(seen).toEqual(["pl-001", "pl-002", "pl-003", "pl-004"]);
  });
});

describe("buildDetailReport", () => {
  it("omits lists without matches and keeps fetch order", async () => {
    const { matches } = await collectMatches(makeSource(), LISTS, (entries) =>
      searchEntries(entries, { field: "description", term: "vendor" }),
    );

    const report = buildDetailReport(matches);

    expect(report).toEqual({
      totalMatches: 2,
      sections: [
        {
          listId: "pl-001",
          listName: "VendorPL",
          count: 2,
          entries: [
            { block: "10.0.0.0/24", description: "Vendor uplink" },
            { block: "10.0.1.0/30", description: "Vendor mgmt" },
          ],
        },
      ],
    });
  });

  it("is empty when nothing matched", () => {
    expect(buildDetailReport([{ list: LISTS[0], entries: [] }])).toEqual({
      sections: [],
      totalMatches: 0,
    });
  });
});

describe("toReportRows", () => {
  it('flattens matches and fills missing fields with "N/A"', () => {
    const matches: ListMatches[] = [
      {
        list: { id: "pl-001", name: "VendorPL" },
        entries: [{ block: "10.0.0.0/24", description: "Vendor uplink" }],
      },
      { list: { id: "pl-005" }, entries: [{ block: "10.9.0.0/16" }] },
      { list: { id: "pl-006", name: "Unmatched" }, entries: [] },
    ];

    expect(toReportRows(matches)).toEqual([
      {
        listId: "pl-001",
        listName: "VendorPL",
        block: "10.0.0.0/24",
        description: "Vendor uplink",
      },
      {
        listId: "pl-005",
        listName: "N/A",
        block: "10.9.0.0/16",
        description: "N/A",
      },
    ]);
  });
});

describe("listingRows", () => {
  it("produces one row per list with blank entry columns", () => {
    const rows = listingRows(new Map([["pl-a", "AlphaPL"]]));
    expect(rows).toEqual([
      { listId: "pl-a", listName: "AlphaPL", block: "", description: "" },
    ]);
  });
});
