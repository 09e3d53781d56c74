import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { isCorpusUnavailableError, isPolicyValidationError } from "@/lib/utils/errors";
import { createCorpusStore, getCorpusStatistics, loadCorpus, parseCorpusRecords } from "./corpus-store";

describe("parseCorpusRecords", () => {
  it("maps builder records and fills defaults", () => {
    const [first] = parseCorpusRecords([{ text: "Apply tourniquet", source: "Hemorrhage CPG" }]);
    expect(first).toEqual({
      text: "Apply tourniquet",
      source: "Hemorrhage CPG",
      section: "",
      category: "general",
      page: 0,
      priorityScore: 0,
    });
  });

  it("rejects records without text", () => {
    expect(() => parseCorpusRecords([{ text: "", source: "x" }], "bad.json")).toThrow(/bad\.json/);
  });
});

describe("loadCorpus", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "recall-corpus-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("takes the highest artifact level present", () => {
    writeFileSync(
      join(dir, "jts_focused_corpus.json"),
      JSON.stringify([{ text: "Focused entry", source: "A", priority_score: 2.5 }])
    );
    writeFileSync(join(dir, "jts_rescue_medicine_cleaned.json"), JSON.stringify([{ text: "Legacy", source: "B" }]));

    const store = loadCorpus({ directory: dir });
    expect(store.level).toBe("focused");
    expect(store.entries.map((e) => e.text)).toEqual(["Focused entry"]);
    expect(store.entries[0]?.priorityScore).toBe(2.5);
  });

  it("fails when no artifact exists", () => {
    let caught: unknown;
    try {
      loadCorpus({ directory: dir });
    } catch (error) {
      caught = error;
    }
    expect(isCorpusUnavailableError(caught)).toBe(true);
    if (isCorpusUnavailableError(caught)) {
      expect(caught.searched).toHaveLength(3);
    }
  });

  it("fails on an unreadable artifact", () => {
    writeFileSync(join(dir, "jts_comprehensive_corpus.json"), "{not json");
    let caught: unknown;
    try {
      loadCorpus({ directory: dir });
    } catch (error) {
      caught = error;
    }
    expect(isPolicyValidationError(caught)).toBe(true);
  });
});

describe("corpus store", () => {
  const store = createCorpusStore([
    { text: "a", source: "Burn CPG", section: "", category: "burn", page: 1, priorityScore: 2 },
    { text: "b", source: "Airway CPG", section: "", category: "airway", page: 2, priorityScore: 4 },
    { text: "c", source: "Airway CPG", section: "", category: "airway", page: 3, priorityScore: 0 },
  ]);

  it("is frozen", () => {
    expect(Object.isFrozen(store.entries)).toBe(true);
    expect(Object.isFrozen(store.entries[0])).toBe(true);
    expect(store.level).toBe("in_memory");
  });

  it("summarizes categories, sources and priority", () => {
    expect(getCorpusStatistics(store)).toEqual({
      totalEntries: 3,
      entriesByCategory: { burn: 1, airway: 2 },
      sources: ["Airway CPG", "Burn CPG"],
      averagePriorityScore: 2,
    });
  });
});
