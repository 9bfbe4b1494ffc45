import { describe, expect, it } from "vitest";

import {
  extractSeniority,
  scoreSeniority,
  seniorityToOrdinal,
} from "@/lib/scoring/seniority";

describe("extractSeniority", () => {
  it.each([
    ["Senior Backend Engineer", "senior"],
    ["Software Engineering Intern", "intern"],
    ["Graduate Trainee", "intern"],
    ["Junior Team Lead", "junior"],
    ["Backend Jr. Developer", "junior"],
    ["Senior Staff Engineer", "lead"],
    ["Principal Architect", "lead"],
    ["Backend Sr. Developer", "senior"],
    ["Mid-level Engineer", "mid"],
  ])("reads %s as %s", (title, level) => {
    expect(extractSeniority(title)).toBe(level);
  });

  it("matches markers as substrings", () => {
    expect(extractSeniority("Internal Tools Engineer")).toBe("intern");
  });

  it("requires a leading space for abbreviations", () => {
    expect(extractSeniority("Sr. Developer")).toBeNull();
  });

  it("returns null when no marker is present", () => {
    expect(extractSeniority("Backend Engineer")).toBeNull();
    expect(extractSeniority(undefined)).toBeNull();
  });
});

describe("seniorityToOrdinal", () => {
  it("maps known levels", () => {
    expect(seniorityToOrdinal("intern")).toBe(0);
    expect(seniorityToOrdinal("mid")).toBe(2);
    expect(seniorityToOrdinal("lead")).toBe(4);
    expect(seniorityToOrdinal("principal")).toBe(4);
  });

  it("returns null for unknown or absent levels", () => {
    expect(seniorityToOrdinal("Senior")).toBeNull();
    expect(seniorityToOrdinal("wizard")).toBeNull();
    expect(seniorityToOrdinal("toString")).toBeNull();
    expect(seniorityToOrdinal(null)).toBeNull();
  });
});

describe("scoreSeniority", () => {
  it("decays with ordinal distance", () => {
    expect(scoreSeniority("Senior Backend Engineer", "senior")).toBe(1);
    expect(scoreSeniority("Lead Developer", "senior")).toBe(0.7);
    expect(scoreSeniority("Junior Developer", "senior")).toBe(0.4);
    expect(scoreSeniority("Software Intern", "lead")).toBe(0.1);
  });

  it("is neutral when either side is unknown", () => {
    expect(scoreSeniority("Senior Backend Engineer", undefined)).toBe(0.5);
    expect(scoreSeniority("Senior Backend Engineer", "")).toBe(0.5);
    expect(scoreSeniority("Senior Backend Engineer", "wizard")).toBe(0.5);
    expect(scoreSeniority("Backend Engineer", "senior")).toBe(0.5);
  });
});
