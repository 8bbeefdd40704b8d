import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import {
  SpelledPitch,
  SpelledInterval,
  SpelledPitchClass,
  SpelledIntervalClass,
  parseSpelled,
} from "./spelled.js";
import { DomainError, ParseError, TypeMismatchError } from "./errors.js";

interface LineOfFifthsTable {
  firstFifths: number;
  pitchClasses: string[];
  intervalClasses: string[];
}

const table: LineOfFifthsTable = JSON.parse(
  readFileSync(fileURLToPath(new URL("./__fixtures__/line-of-fifths.json", import.meta.url)), "utf8"),
);

const sp = SpelledPitch.parse;
const si = SpelledInterval.parse;
const spc = SpelledPitchClass.parse;
const sic = SpelledIntervalClass.parse;

describe("SpelledPitch", () => {
  it("parses C#4", () => {
    const p = sp("C#4");
    expect(p.fifths()).toBe(7);
    expect(p.octaves()).toBe(4);
    expect(p.internalOctaves()).toBe(0);
    expect(p.name()).toBe("C#4");
    expect(p.alteration()).toBe(1);
    expect(p.letter()).toBe("C");
  });

  it("keeps the written octave of double flats", () => {
    const p = sp("Dbb5");
    expect(p.fifths()).toBe(-12);
    expect(p.internalOctaves()).toBe(12);
    expect(p.octaves()).toBe(5);
    expect(p.letter()).toBe("D");
    expect(p.degree()).toBe(1);
    expect(String(p)).toBe("Dbb5");
  });

  it("round-trips every pitch of the golden table", () => {
    table.pitchClasses.forEach((name, idx) => {
      const p = sp(`${name}4`);
      expect(p.name()).toBe(`${name}4`);
      expect(p.fifths()).toBe(table.firstFifths + idx);
      expect(p.isPitch).toBe(true);
      expect(p.isClass).toBe(false);
    });
  });

  it("prints unicode input with ASCII accidentals", () => {
    expect(sp("B♭3").name()).toBe("Bb3");
  });

  it("rejects a pitch class string", () => {
    expect(() => sp("C#")).toThrow(ParseError);
    expect(() => sp("C#")).toThrow("the octave is missing");
  });

  it("rejects non-integer coordinates", () => {
    expect(() => SpelledPitch.fromFifthsAndOctaves(0, 0.5)).toThrow(DomainError);
  });

  it("builds from written or internal octaves", () => {
    expect(SpelledPitch.fromIndependent(7, 4).equals(sp("C#4"))).toBe(true);
    expect(SpelledPitch.fromFifthsAndOctaves(7, 0).equals(sp("C#4"))).toBe(true);
  });

  it("distinguishes enharmonic spellings", () => {
    expect(sp("C#4").equals(sp("Db4"))).toBe(false);
  });

  it("is frozen", () => {
    const p = sp("C4");
    expect(Object.isFrozen(p)).toBe(true);
    expect(Object.isFrozen(p.value)).toBe(true);
  });
});

describe("SpelledPitch arithmetic", () => {
  it("pitch - pitch is an interval", () => {
    const i = sp("E4").sub(sp("C4"));
    expect(i).toBeInstanceOf(SpelledInterval);
    expect(i.name()).toBe("M3:0");
  });

  it("pitch ± interval is a pitch", () => {
    expect(sp("C4").add(si("M3:0")).name()).toBe("E4");
    expect(sp("E4").sub(si("M3:0")).name()).toBe("C4");
  });

  it("(p + i) - i = p", () => {
    for (const [p, i] of [["Eb4", "aa2:1"], ["F#-1", "-m6:2"], ["Gbb7", "d5:0"]]) {
      expect(sp(p).add(si(i)).sub(si(i)).equals(sp(p))).toBe(true);
    }
  });

  it("measures intervals in both directions", () => {
    expect(sp("C4").intervalTo(sp("E4")).name()).toBe("M3:0");
    expect(sp("E4").intervalFrom(sp("C4")).name()).toBe("M3:0");
    expect(sp("C4").intervalFrom(sp("E4")).name()).toBe("-M3:0");
  });

  it("refuses to add two pitches or mix in a pitch class", () => {
    expect(() => sp("C#4").combine("add", sp("Gb5"))).toThrow(TypeMismatchError);
    expect(() => sp("C4").combine("add", spc("C"))).toThrow("Cannot add SpelledPitch and SpelledPitchClass");
    expect(() => spc("G").combine("sub", sp("G4"))).toThrow(
      "Cannot subtract SpelledPitchClass and SpelledPitch",
    );
  });

  it("orders pitches diatonically", () => {
    expect(sp("C4").compare(sp("C#4"))).toBe(-1);
    expect(sp("B#3").compare(sp("C4"))).toBe(-1);
    expect(sp("D4").compare(sp("C##4"))).toBe(1);
    expect(sp("C4").compare(sp("C4"))).toBe(0);
  });
});

describe("SpelledInterval", () => {
  it("P4:0 + P5:0 = P1:1", () => {
    const sum = si("P4:0").add(si("P5:0"));
    expect(sum.equals(si("P1:1"))).toBe(true);
    expect(sum.equals(SpelledInterval.octave())).toBe(true);
    expect(sum.name()).toBe("P1:1");
  });

  it("round-trips canonical names", () => {
    for (const name of ["M6:0", "-m3:0", "aa2:1", "-P1:1", "P1:0", "d1:0", "-M7:2", "a4:0"]) {
      expect(si(name).name()).toBe(name);
    }
  });

  it("round-trips every interval class of the golden table in both directions", () => {
    table.intervalClasses.forEach((name, idx) => {
      expect(si(`${name}:4`).name()).toBe(`${name}:4`);
      expect(si(`-${name}:4`).name()).toBe(`-${name}:4`);
      expect(si(`${name}:4`).fifths()).toBe(table.firstFifths + idx);
    });
  });

  it("stores downward intervals as negated coordinates", () => {
    const i = si("-m3:0");
    expect(i.fifths()).toBe(3);
    expect(i.internalOctaves()).toBe(-2);
    expect(i.octaves()).toBe(-1);
    expect(i.diatonicSteps()).toBe(-2);
  });

  it("direction follows the diatonic steps", () => {
    expect(si("M2:0").direction()).toBe(1);
    expect(si("-m2:0").direction()).toBe(-1);
    expect(si("P1:0").direction()).toBe(0);
    expect(si("a1:0").direction()).toBe(0);
    expect(si("d1:0").direction()).toBe(0);
  });

  it("generic is signed, degree is not", () => {
    const down = si("-m2:0");
    expect(down.generic()).toBe(-1);
    expect(down.degree()).toBe(6);
    expect(si("M6:0").generic()).toBe(5);
    expect(si("-P1:1").generic()).toBe(0);
  });

  it("measures alteration on the upward form", () => {
    expect(si("a4:0").alteration()).toBe(1);
    expect(si("-d5:0").alteration()).toBe(-1);
    expect(si("m3:0").alteration()).toBe(-1);
    expect(si("M3:0").alteration()).toBe(0);
  });

  it("recognizes steps", () => {
    expect(si("M2:0").isStep()).toBe(true);
    expect(si("-m2:0").isStep()).toBe(true);
    expect(si("a1:0").isStep()).toBe(true);
    expect(si("m3:0").isStep()).toBe(false);
    expect(si("P1:1").isStep()).toBe(false);
  });

  it("scales by integers and rejects inexact division", () => {
    expect(si("M2:0").mul(3).name()).toBe("a4:0");
    expect(si("a4:0").div(3).name()).toBe("M2:0");
    expect(() => si("M2:0").div(2)).toThrow(DomainError);
    expect(() => si("M2:0").div(0)).toThrow(DomainError);
  });

  it("negates and takes absolute values", () => {
    expect(si("M3:0").neg().name()).toBe("-M3:0");
    expect(si("-M3:0").abs().equals(si("M3:0"))).toBe(true);
    expect(si("M3:0").abs().equals(si("M3:0"))).toBe(true);
  });

  it("x - x is the unison", () => {
    const x = si("dd6:2");
    expect(x.sub(x).equals(SpelledInterval.unison())).toBe(true);
  });

  it("defines the chromatic semitone as a1:0", () => {
    expect(SpelledInterval.chromaticSemitone().name()).toBe("a1:0");
    expect(sp("C4").add(SpelledInterval.chromaticSemitone()).name()).toBe("C#4");
  });

  it("orders by diatonic size", () => {
    expect(si("m3:0").compare(si("M2:0"))).toBe(1);
    expect(si("-M2:0").compare(si("P1:0"))).toBe(-1);
  });

  it("ranks sharper intervals of the same generic size higher", () => {
    expect(si("P1:0").compare(si("a1:0"))).toBe(-1);
    expect(si("a1:0").compare(si("P1:0"))).toBe(1);
    expect(si("m3:0").compare(si("M3:0"))).toBe(-1);
    expect(si("M3:0").compare(si("m3:0"))).toBe(1);
    expect(si("M3:0").compare(si("M3:0"))).toBe(0);
  });

  it("rejects an interval class string", () => {
    expect(() => si("M6")).toThrow(ParseError);
  });

  it("refuses interval classes as operands", () => {
    expect(() => si("M2:0").combine("add", sic("M2"))).toThrow(
      "Cannot add SpelledInterval and SpelledIntervalClass",
    );
  });
});

describe("SpelledPitchClass", () => {
  it("C# - Gb = aa4", () => {
    const ic = spc("C#").sub(spc("Gb"));
    expect(ic).toBeInstanceOf(SpelledIntervalClass);
    expect(ic.fifths()).toBe(13);
    expect(ic.name()).toBe("aa4");
  });

  it("round-trips the golden table", () => {
    table.pitchClasses.forEach((name, idx) => {
      const pc = spc(name);
      expect(pc.name()).toBe(name);
      expect(pc.fifths()).toBe(table.firstFifths + idx);
      expect(pc.isClass).toBe(true);
    });
  });

  it("is the class of a pitch", () => {
    expect(sp("C#4").toClass().equals(spc("C#"))).toBe(true);
    expect(sp("Bb-2").pc().name()).toBe("Bb");
  });

  it("embeds into octave 0", () => {
    expect(spc("C#").embed().name()).toBe("C#0");
    expect(spc("B").embed().name()).toBe("B0");
    expect(spc("Cb").embed().name()).toBe("Cb0");
  });

  it("orders by fifths", () => {
    expect(spc("F#").compare(spc("Gb"))).toBe(1);
    expect(spc("C").compare(spc("G"))).toBe(-1);
  });

  it("rejects an octave", () => {
    expect(() => spc("C#4")).toThrow(ParseError);
  });

  it("rejects non-integer fifths", () => {
    expect(() => SpelledPitchClass.fromFifths(1.5)).toThrow(DomainError);
  });
});

describe("SpelledIntervalClass", () => {
  it("parses a downward class as its complement", () => {
    expect(sic("-m3").equals(sic("M6"))).toBe(true);
    expect(sic("-m3").name()).toBe("M6");
    expect(sic("M6").name(true)).toBe("-m3");
  });

  it("satisfies the inversion laws for the golden table", () => {
    const last = table.intervalClasses.length - 1;
    table.intervalClasses.forEach((name, idx) => {
      const x = sic(name);
      expect(x.fifths()).toBe(table.firstFifths + idx);
      expect(x.sub(x).equals(SpelledIntervalClass.unison())).toBe(true);
      expect(x.neg().neg().equals(x)).toBe(true);
      expect(x.neg().name()).toBe(table.intervalClasses[last - idx]);
    });
  });

  it("points seconds to fourths up and fifths to sevenths down", () => {
    expect(sic("P1").direction()).toBe(0);
    expect(sic("M2").direction()).toBe(1);
    expect(sic("P4").direction()).toBe(1);
    expect(sic("P5").direction()).toBe(-1);
    expect(sic("M7").direction()).toBe(-1);
  });

  it("breaks the unison tie by alteration", () => {
    expect(sic("a1").direction()).toBe(1);
    expect(sic("d1").direction()).toBe(-1);
    expect(sic("d1").abs().name()).toBe("a1");
  });

  it("recognizes steps", () => {
    expect(sic("M2").isStep()).toBe(true);
    expect(sic("m7").isStep()).toBe(true);
    expect(sic("a1").isStep()).toBe(true);
    expect(sic("M3").isStep()).toBe(false);
  });

  it("collapses the octave onto the unison", () => {
    expect(SpelledIntervalClass.octave().equals(SpelledIntervalClass.unison())).toBe(true);
    expect(SpelledIntervalClass.chromaticSemitone().name()).toBe("a1");
  });

  it("is the class of an interval", () => {
    expect(si("-m3:0").toClass().name()).toBe("M6");
    expect(si("M2:1").ic().name()).toBe("M2");
  });

  it("embeds into the first octave", () => {
    expect(sic("M6").embed().name()).toBe("M6:0");
    expect(sic("-m3").embed().name()).toBe("M6:0");
  });

  it("rejects an octave", () => {
    expect(() => sic("M6:0")).toThrow(ParseError);
  });
});

describe("parseSpelled", () => {
  it("picks the matching type", () => {
    expect(parseSpelled("C#4")).toBeInstanceOf(SpelledPitch);
    expect(parseSpelled("C#")).toBeInstanceOf(SpelledPitchClass);
    expect(parseSpelled("-m3:0")).toBeInstanceOf(SpelledInterval);
    expect(parseSpelled("-m3")).toBeInstanceOf(SpelledIntervalClass);
    expect(parseSpelled("-m3").name()).toBe("M6");
  });

  it("builds intervals with their sign and octave", () => {
    expect(parseSpelled("-m3:0").equals(si("-m3:0"))).toBe(true);
    expect(parseSpelled("aa2:1").equals(si("aa2:1"))).toBe(true);
    expect(parseSpelled("aa2:1").name()).toBe("aa2:1");
  });

  it("rejects invalid notation", () => {
    expect(() => parseSpelled("H4")).toThrow(ParseError);
    expect(() => parseSpelled("C##b4")).toThrow(ParseError);
  });
});
