import { describe, it, expect } from "vitest";
import type { CorpusEntry } from "@/lib/types/corpus";
import {
  buildRankerIndex,
  inverseDocumentFrequency,
  queryIndex,
  scoreEntry,
  searchIndex,
  tokenize,
} from "./lexical-ranker";

function entry(text: string): CorpusEntry {
  return { text, source: "test", section: "", category: "general", page: 0, priorityScore: 0 };
}

const corpus = [
  entry("Apply tourniquet for arterial bleeding"),
  entry("Ketamine dosing for pain management"),
  entry("Tourniquet conversion after two hours"),
  entry("Hypothermia prevention in trauma"),
  entry("Needle decompression for tension pneumothorax"),
];

describe("tokenize", () => {
  it("keeps dosage notation and drops stop words and edge punctuation", () => {
    expect(tokenize("Give 0.3 mg/kg IV, then reassess.")).toEqual(["give", "0.3", "mg/kg", "iv", "reassess"]);
  });

  it("keeps percentages and trims slashes from token edges", () => {
    expect(tokenize("SpO2 90% and/ -mg/kg/")).toEqual(["spo2", "90%", "mg/kg"]);
  });

  it("drops single letters but keeps single digits", () => {
    expect(tokenize("x 5 b")).toEqual(["5"]);
  });

  it("keeps stop words when filtering is off", () => {
    expect(tokenize("the airway", false)).toEqual(["the", "airway"]);
  });
});

describe("buildRankerIndex", () => {
  it("records document frequency and average length", () => {
    const index = buildRankerIndex(corpus);
    expect(index.totalDocs).toBe(5);
    expect(index.documentFrequency.get("tourniquet")).toBe(2);
    // 4 + 4 + 5 + 3 + 4 tokens ("for" and "in" are stop words)
    expect(index.averageDocumentLength).toBe(4);
    expect(Object.isFrozen(index)).toBe(true);
  });
});

describe("scoring", () => {
  const index = buildRankerIndex(corpus);

  it("gives terms absent from the corpus zero weight", () => {
    expect(inverseDocumentFrequency(index, "zebra")).toBe(0);
    expect(scoreEntry(index, 0, ["zebra"])).toBe(0);
    expect(scoreEntry(index, 0, ["tourniquet", "zebra"])).toBe(scoreEntry(index, 0, ["tourniquet"]));
  });

  it("floors the idf of a term found in every entry at zero", () => {
    const common = buildRankerIndex([entry("wound care"), entry("wound packing"), entry("wound closure")]);
    expect(inverseDocumentFrequency(common, "wound")).toBe(0);
  });

  it("never decreases as term frequency rises at fixed document length", () => {
    const docs = [
      entry("tourniquet pressure dressing wound"),
      entry("tourniquet tourniquet dressing wound"),
      entry("ketamine pain"),
      entry("hypothermia prevention"),
      entry("airway adjunct"),
    ];
    const tfIndex = buildRankerIndex(docs);
    expect(tfIndex.documentLengths[0]).toBe(tfIndex.documentLengths[1]);
    expect(scoreEntry(tfIndex, 1, ["tourniquet"])).toBeGreaterThan(scoreEntry(tfIndex, 0, ["tourniquet"]));
  });
});

describe("queryIndex", () => {
  const index = buildRankerIndex(corpus);

  it("returns only entries matching a query term", () => {
    const results = searchIndex(index, "tourniquet");
    // equal term frequency, so the shorter entry ranks first
    expect(results.map((r) => r.position)).toEqual([0, 2]);
    expect(results.every((r) => r.matchedTerms.includes("tourniquet"))).toBe(true);
  });

  it("returns nothing for empty, stop-word-only or unknown queries", () => {
    expect(searchIndex(index, "")).toEqual([]);
    expect(searchIndex(index, "the of and")).toEqual([]);
    expect(queryIndex(index, ["zebra"])).toEqual([]);
  });

  it("breaks ties by corpus order and is repeatable", () => {
    const tied = buildRankerIndex([
      entry("needle decompression chest"),
      entry("needle decompression chest"),
      entry("ketamine pain"),
      entry("pelvic binder"),
      entry("burn dressing"),
    ]);
    const first = searchIndex(tied, "needle decompression");
    const second = searchIndex(tied, "needle decompression");
    expect(first.map((r) => r.position)).toEqual([0, 1]);
    expect(second.map((r) => r.position)).toEqual([0, 1]);
    expect(first[0]?.score).toBe(first[1]?.score);
  });

  it("respects topN", () => {
    expect(searchIndex(index, "tourniquet", 1)).toHaveLength(1);
    expect(searchIndex(index, "tourniquet", 0)).toEqual([]);
  });
});
