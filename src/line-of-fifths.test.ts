import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import {
  diatonicSteps,
  degreeFromFifths,
  genericIntervalNumber,
  accidentals,
  pitchClassLetter,
  intervalQuality,
  intervalClassName,
  fifthsFromLetter,
  fifthsFromGeneric,
  letterFromDegree,
} from "./line-of-fifths.js";
import { DomainError } from "./errors.js";

interface LineOfFifthsTable {
  firstFifths: number;
  pitchClasses: string[];
  intervalClasses: string[];
}

const table: LineOfFifthsTable = JSON.parse(
  readFileSync(fileURLToPath(new URL("./__fixtures__/line-of-fifths.json", import.meta.url)), "utf8"),
);

describe("golden line of fifths", () => {
  it("names every pitch class from Dbbbb to B###", () => {
    table.pitchClasses.forEach((name, idx) => {
      expect(pitchClassLetter(table.firstFifths + idx)).toBe(name);
    });
  });

  it("names every interval class from ddd2 to aaa7", () => {
    table.intervalClasses.forEach((name, idx) => {
      expect(intervalClassName(table.firstFifths + idx)).toBe(name);
    });
  });

  it("inverse names mirror the table", () => {
    const last = table.intervalClasses.length - 1;
    table.intervalClasses.forEach((_, idx) => {
      expect(intervalClassName(table.firstFifths + idx, true)).toBe(table.intervalClasses[last - idx]);
    });
  });
});

describe("diatonic arithmetic", () => {
  it("a fifth spans four diatonic steps", () => {
    expect(diatonicSteps(1)).toBe(4);
    expect(diatonicSteps(-3)).toBe(-12);
  });

  it("degree wraps into 0..6", () => {
    expect(degreeFromFifths(0)).toBe(0);
    expect(degreeFromFifths(1)).toBe(4);
    expect(degreeFromFifths(-1)).toBe(3);
    expect(degreeFromFifths(2)).toBe(1);
  });

  it("generic numbers are 1-based", () => {
    expect(genericIntervalNumber(0)).toBe(1);
    expect(genericIntervalNumber(5)).toBe(7);
    expect(genericIntervalNumber(-5)).toBe(2);
  });

  it("counts accidentals with floor division", () => {
    expect(accidentals(5)).toBe(0);
    expect(accidentals(6)).toBe(1);
    expect(accidentals(-1)).toBe(0);
    expect(accidentals(-2)).toBe(-1);
    expect(accidentals(-9)).toBe(-2);
  });
});

describe("intervalQuality", () => {
  it("covers the unaltered band", () => {
    expect([-5, -4, -3, -2, -1, 0, 1, 2, 3, 4, 5].map(intervalQuality).join("")).toBe("mmmmPPPMMMM");
  });

  it("switches to augmented and diminished at ±6", () => {
    expect(intervalQuality(6)).toBe("a");
    expect(intervalQuality(-6)).toBe("d");
    expect(intervalQuality(13)).toBe("aa");
    expect(intervalQuality(-26)).toBe("ddd");
  });
});

describe("fifthsFromLetter", () => {
  it("maps naturals onto the line", () => {
    expect(["F", "C", "G", "D", "A", "E", "B"].map(fifthsFromLetter)).toEqual([-1, 0, 1, 2, 3, 4, 5]);
  });

  it("rejects other letters", () => {
    expect(() => fifthsFromLetter("H")).toThrow(DomainError);
    expect(() => fifthsFromLetter("c")).toThrow(DomainError);
    expect(() => fifthsFromLetter("toString")).toThrow(DomainError);
  });
});

describe("fifthsFromGeneric", () => {
  it("returns the perfect or major interval", () => {
    expect([1, 2, 3, 4, 5, 6, 7].map(fifthsFromGeneric)).toEqual([0, 2, 4, -1, 1, 3, 5]);
  });

  it("throws DomainError outside 1..7", () => {
    expect(() => fifthsFromGeneric(0)).toThrow(DomainError);
    expect(() => fifthsFromGeneric(8)).toThrow("Generic interval must be an integer in 1..7, got 8");
    expect(() => fifthsFromGeneric(2.5)).toThrow(DomainError);
  });
});

describe("letterFromDegree", () => {
  it("walks the diatonic scale from C", () => {
    expect([0, 1, 2, 3, 4, 5, 6, 7, -1].map(letterFromDegree).join("")).toBe("CDEFGABCB");
  });
});
