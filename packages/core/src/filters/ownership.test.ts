import { describe, it, expect } from "vitest";
import { filterByOwner, selectPrefixLists } from "./ownership.js";
import type { PrefixList } from "../schemas/prefix-list.js";

const LISTS: PrefixList[] = [
  { id: "pl-001", name: "AlphaPL", owner: "111111111111" },
  { id: "pl-002", name: "GammaPL", owner: "222222222222" },
  { id: "pl-003", name: "DeprecatedPL", owner: "111111111111" },
];

describe("filterByOwner", () => {
  it("keeps only lists owned by the account", () => {
    const result = filterByOwner(LISTS, "111111111111");

    expect(result.map((l) => l.id)).toEqual(["pl-001", "pl-003"]);
    for (const list of result) {
      expect(list.owner).toBe("111111111111");
    }
  });

  it("returns every list without an owner id", () => {
    expect(filterByOwner(LISTS)).toEqual(LISTS);
  });

  it("compares owner ids exactly", () => {
    expect(filterByOwner(LISTS, " 111111111111")).toEqual([]);
  });
});

describe("selectPrefixLists", () => {
  it("requires ownership and both name criteria", () => {
    const result = selectPrefixLists(LISTS, {
      ownerId: "111111111111",
      nameInclude: "pl",
      nameExclude: "deprecated",
    });

    expect(result).toEqual([
      { id: "pl-001", name: "AlphaPL", owner: "111111111111" },
    ]);
  });
});
