import { describe, expect, it } from "vitest";

import {
  aspectSummary,
  aspectsFromBody,
  aspectsToBody,
  aspectsToHouse,
  bodyAspect,
  classifyOrb,
  computeAspectMatrix,
  conjunctionCloseness,
  conjunctions,
  drishtiEffect,
  houseAspectSummary,
  mutualAspects,
} from "@/lib/chart/aspects";
import { buildHouses } from "@/lib/chart/houses";
import { derivePosition } from "@/lib/chart/position";

describe("classifyOrb", () => {
  it("uses inclusive upper bounds", () => {
    expect(classifyOrb(0)).toEqual({ category: "exact", strength: 1 });
    expect(classifyOrb(1)).toEqual({ category: "exact", strength: 1 });
    expect(classifyOrb(1.01)).toEqual({ category: "close", strength: 0.75 });
    expect(classifyOrb(3)).toEqual({ category: "close", strength: 0.75 });
    expect(classifyOrb(3.01)).toEqual({ category: "wide", strength: 0.5 });
    expect(classifyOrb(8)).toEqual({ category: "very_wide", strength: 0.25 });
    expect(classifyOrb(8.01)).toEqual({ category: "none", strength: 0 });
  });

  it("never grows stronger as the orb widens", () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let orb = 0; orb <= 10; orb += 0.25) {
      const { strength } = classifyOrb(orb);
      expect(strength).toBeLessThanOrEqual(previous);
      previous = strength;
    }
  });
});

describe("drishtiEffect", () => {
  it("reads the effect table by nature and tier", () => {
    expect(drishtiEffect("Benefic", "dignified")).toBe("Very Auspicious");
    expect(drishtiEffect("Benefic", "inimical")).toBe("Neutral");
    expect(drishtiEffect("Malefic", "friendly")).toBe("Mildly Inauspicious");
    expect(drishtiEffect("Malefic", "debilitated")).toBe("Extremely Inauspicious");
    expect(drishtiEffect("Neutral", "dignified")).toBe("Neutral");
  });

  it("prefixes the strength in degree mode", () => {
    expect(drishtiEffect("Benefic", "friendly", "degree", 0.75)).toBe("Strong Auspicious");
    expect(drishtiEffect("Malefic", "neutral", "degree", 0.5)).toBe("Moderate Inauspicious");
    expect(drishtiEffect("Malefic", "neutral", "degree", 0.25)).toBe("Weak Inauspicious");
  });
});

describe("bodyAspect in degree mode", () => {
  it("scores an opposition 3° off the exact point as close", () => {
    const result = bodyAspect(derivePosition("Sun", 10), derivePosition("Saturn", 193), "degree");

    expect(result.primary).toMatchObject({
      angle: 180,
      label: "7th Aspect",
      orb: 3,
      category: "close",
      strength: 0.75,
      aspectedSign: "Libra",
      dignity: "Debilitated (exact)",
      effect: "Strong Extremely Inauspicious",
    });
    expect(result.orbCategory).toBe("close");
    expect(result.totalStrength).toBe(0.75);
  });

  it("drops to wide just past 3°", () => {
    const result = bodyAspect(derivePosition("Sun", 10), derivePosition("Saturn", 193.01), "degree");

    expect(result.orbCategory).toBe("wide");
    expect(result.strength).toBe(0.5);
    expect(result.primary?.effect).toBe("Moderate Extremely Inauspicious");
  });

  it("reports no aspect beyond 8°", () => {
    const result = bodyAspect(derivePosition("Sun", 10), derivePosition("Saturn", 200), "degree");

    expect(result.matches).toEqual([]);
    expect(result.primary).toBeNull();
    expect(result.orbCategory).toBe("none");
    expect(result.strength).toBe(0);
  });

  it("picks the matching angle among several", () => {
    const result = bodyAspect(derivePosition("Jupiter", 0), derivePosition("Moon", 122), "degree");

    expect(result.matches).toHaveLength(1);
    expect(result.primary).toMatchObject({
      angle: 120,
      label: "5th Aspect",
      orb: 2,
      aspectedSign: "Leo",
      dignity: "Neutral",
      effect: "Strong Mildly Auspicious",
    });
  });

  it("ignores a body paired with itself", () => {
    const sun = derivePosition("Sun", 10);
    const result = bodyAspect(sun, sun, "degree");

    expect(result.matches).toEqual([]);
    expect(result.primary).toBeNull();
  });
});

describe("bodyAspect in rasi mode", () => {
  it("aspects the whole sign with full strength", () => {
    const result = bodyAspect(derivePosition("Mars", 5), derivePosition("Moon", 95), "rasi");

    expect(result.primary).toEqual({
      angle: 90,
      label: "4th Aspect",
      orb: null,
      category: "exact",
      strength: 1,
      aspectedSign: "Cancer",
      dignity: "Debilitated",
      effect: "Extremely Inauspicious",
    });
  });

  it("reads the neutral row for a neutral placement", () => {
    const result = bodyAspect(derivePosition("Jupiter", 0), derivePosition("Moon", 125), "rasi");

    expect(result.primary).toMatchObject({
      angle: 120,
      aspectedSign: "Leo",
      dignity: "Neutral",
      effect: "Mildly Auspicious",
    });
  });

  it("uses the swapped angles of a retrograde body", () => {
    const mars = derivePosition("Mars", 5, 0, -0.1);

    expect(bodyAspect(mars, derivePosition("Moon", 95), "rasi").primary).toBeNull();
    expect(bodyAspect(mars, derivePosition("Moon", 275), "rasi").primary?.angle).toBe(270);
  });
});

describe("aspect matrix", () => {
  const bodies = {
    Sun: derivePosition("Sun", 10),
    Moon: derivePosition("Moon", 190),
  };
  const houses = buildHouses(0, bodies);
  const matrix = computeAspectMatrix(bodies, houses, "rasi");

  it("records directed aspects between bodies", () => {
    expect(aspectsToBody(matrix, "Moon").map((result) => result.source)).toEqual(["Sun"]);
    expect(aspectsFromBody(matrix, "Moon").map((result) => result.target)).toEqual([
      { kind: "body", body: "Sun" },
    ]);
  });

  it("finds mutual aspects", () => {
    const mutual = mutualAspects(matrix);

    expect(mutual).toHaveLength(1);
    expect(mutual[0].bodies).toEqual(["Sun", "Moon"]);
    expect(mutual[0].combinedStrength).toBe(2);
  });

  it("aspects house cusps", () => {
    expect(aspectsToHouse(matrix, 7).map((result) => result.source)).toEqual(["Sun"]);
    expect(aspectsToHouse(matrix, 1).map((result) => result.source)).toEqual(["Moon"]);
    expect(aspectsToHouse(matrix, 2)).toEqual([]);
  });

  it("summarizes the aspects of the chart", () => {
    const summary = aspectSummary(matrix, bodies);

    expect(summary.totalAspects).toBe(2);
    expect(summary.averageStrength).toBe(1);
    expect(summary.byAngle).toEqual({ "180": 2 });
    expect(summary.strong).toHaveLength(2);
    expect(summary.weak).toHaveLength(0);
    expect(summary.exact).toHaveLength(2);
    expect(summary.mostAspected).toBe("Sun");
    expect(summary.mostAspecting).toBe("Sun");
    expect(summary.conjunctions).toEqual([]);
    expect(summary.mutualAspects).toHaveLength(1);
  });

  it("summarizes the aspects on a house", () => {
    const seventh = houseAspectSummary(matrix, houses, 7);
    expect(seventh).toMatchObject({ auspicious: 0, inauspicious: 1, neutral: 0 });
    expect(seventh.influence).toBe("Predominantly Inauspicious");
    expect(seventh.strongest?.source).toBe("Sun");

    const first = houseAspectSummary(matrix, houses, 1);
    expect(first.aspects[0].primary?.effect).toBe("Mildly Auspicious");
    expect(first.influence).toBe("Predominantly Auspicious");

    const second = houseAspectSummary(matrix, houses, 2);
    expect(second.influence).toBe("No major aspects");
    expect(second.strongest).toBeNull();
  });

  it("reports mixed influences when effects balance", () => {
    const mixedBodies = { ...bodies, Venus: derivePosition("Venus", 15) };
    const mixedHouses = buildHouses(0, mixedBodies);
    const mixed = computeAspectMatrix(mixedBodies, mixedHouses, "rasi");
    const seventh = houseAspectSummary(mixed, mixedHouses, 7);

    expect(seventh.aspects.map((result) => result.primary?.effect)).toEqual([
      "Extremely Inauspicious",
      "Very Auspicious",
    ]);
    expect(seventh.influence).toBe("Mixed Influences");
  });
});

describe("conjunctions", () => {
  const bodies = {
    Sun: derivePosition("Sun", 10),
    Mercury: derivePosition("Mercury", 12),
    Venus: derivePosition("Venus", 25),
  };

  it("pairs bodies within the orb", () => {
    expect(conjunctions(bodies)).toEqual([
      { bodies: ["Sun", "Mercury"], distance: 2, closeness: "Close" },
    ]);
  });

  it("widens with a larger orb", () => {
    expect(conjunctions(bodies, 15).map((entry) => entry.bodies)).toEqual([
      ["Sun", "Mercury"],
      ["Sun", "Venus"],
      ["Mercury", "Venus"],
    ]);
  });

  it("grades closeness", () => {
    expect(conjunctionCloseness(1)).toBe("Very Close");
    expect(conjunctionCloseness(3)).toBe("Close");
    expect(conjunctionCloseness(4)).toBe("Moderate");
    expect(conjunctionCloseness(6)).toBe("Wide");
  });
});
