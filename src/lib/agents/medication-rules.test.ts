import { describe, it, expect } from "vitest";
import { getDefaultClinicalPolicy } from "@/lib/policy/clinical-policy";
import { buildMedicationRecommendation, computeDose, matchMedication } from "./medication-rules";

const { medications } = getDefaultClinicalPolicy();

function describeDose(query: string, weightKg: number | null): string | undefined {
  const match = matchMedication(query, medications);
  return match ? buildMedicationRecommendation(match, weightKg).description : undefined;
}

describe("matchMedication", () => {
  it("picks the intent named in the query", () => {
    expect(matchMedication("ketamine for sedation", medications)?.intent.name).toBe("sedation");
    expect(matchMedication("ketamine for pain", medications)?.intent.name).toBe("pain");
    expect(matchMedication("ketamine", medications)?.intent.name).toBe("unspecified");
  });

  it("matches alternate names on word boundaries", () => {
    expect(matchMedication("epi for anaphylaxis", medications)?.rule.name).toBe("epinephrine");
    expect(matchMedication("epidural catheter", medications)).toBeNull();
  });
});

describe("dose scaling", () => {
  it("rounds rate times weight", () => {
    expect(computeDose(0.3, 80)).toBe(24);
    expect(computeDose(0.1, 69.853168)).toBe(7);
  });

  it("speaks the weight-scaled ketamine pain dose", () => {
    const match = matchMedication("ketamine for pain", medications);
    expect(match).not.toBeNull();
    if (!match) return;

    const recommendation = buildMedicationRecommendation(match, 80);
    expect(recommendation.description).toBe("Ketamine 0.3 mg/kg IV. For 80kg patient: 24mg IV.");
    expect(recommendation.dose).toBe(24);
    expect(recommendation.doseUnit).toBe("mg");
    expect(recommendation.route).toBe("IV");
  });

  it("names both indications when ketamine intent is unspecified", () => {
    expect(describeDose("ketamine", 80)).toBe(
      "Ketamine 0.3 mg/kg IV for pain, 1-2 mg/kg IV for sedation. For 80kg patient: 24mg IV for pain."
    );
  });

  it("uses micrograms for fentanyl", () => {
    expect(describeDose("fentanyl", 70)).toBe("Fentanyl 1 mcg/kg IV. For 70kg patient: 70mcg IV.");
  });
});

describe("population fallback", () => {
  it("speaks the range without a weight", () => {
    expect(describeDose("ketamine for pain", null)).toBe("Ketamine 0.3 mg/kg IV for pain. Monitor respiratory rate.");
    expect(describeDose("ketamine for sedation", null)).toBe(
      "Ketamine 1-2 mg/kg IV for sedation. Monitor respiratory rate."
    );
  });

  it("speaks fixed doses regardless of weight", () => {
    expect(describeDose("txa", 80)).toBe("TXA 1g IV over 10 minutes. Then 1g over 8 hours.");
    expect(describeDose("epinephrine for anaphylaxis", 80)).toBe("Epinephrine 0.3-0.5mg IM every 5-15 minutes.");
    expect(describeDose("atropine", null)).toBe("Atropine 1mg IV. May repeat every 3-5 minutes up to 3mg total.");
  });
});
