import { describe, it, expect } from "vitest";
import {
  advanceGuidedAirway,
  AIRWAY_INTERVENTION,
  AIRWAY_MONITOR,
  isGuidedAirwayAnswer,
  isGuidedAirwayCancel,
  isGuidedAirwayRequest,
  startGuidedAirway,
} from "./guided-airway";

describe("guided airway assessment", () => {
  it("starts on request", () => {
    expect(isGuidedAirwayRequest("walk me through airway")).toBe(true);
    expect(isGuidedAirwayRequest("airway obstruction")).toBe(false);
    expect(startGuidedAirway()).toEqual({ state: { step: "conscious" }, response: "Is the patient conscious?" });
  });

  it("ends in monitoring after two yes answers", () => {
    const first = advanceGuidedAirway({ step: "conscious" }, "yes");
    expect(first).toEqual({
      state: { step: "verbal" },
      response: "Is the patient able to speak or respond verbally?",
    });

    const second = advanceGuidedAirway({ step: "verbal" }, "yeah he is talking");
    expect(second).toEqual({ state: null, response: AIRWAY_MONITOR });
  });

  it("calls for intervention on any no", () => {
    expect(advanceGuidedAirway({ step: "conscious" }, "no")).toEqual({ state: null, response: AIRWAY_INTERVENTION });
    expect(advanceGuidedAirway({ step: "verbal" }, "negative")).toEqual({ state: null, response: AIRWAY_INTERVENTION });
  });

  it("repeats the question on an unclear answer", () => {
    expect(advanceGuidedAirway({ step: "verbal" }, "maybe")).toEqual({
      state: { step: "verbal" },
      response: "Is the patient able to speak or respond verbally?",
    });
    expect(advanceGuidedAirway({ step: "conscious" }, "i'm not sure")).toEqual({
      state: { step: "conscious" },
      response: "Is the patient conscious?",
    });
  });

  it("tells answers from cancellations", () => {
    expect(isGuidedAirwayAnswer("yes")).toBe(true);
    expect(isGuidedAirwayAnswer("nope")).toBe(true);
    expect(isGuidedAirwayAnswer("not sure")).toBe(false);
    expect(isGuidedAirwayCancel("cancel that")).toBe(true);
    expect(isGuidedAirwayCancel("maybe")).toBe(false);
  });
});
