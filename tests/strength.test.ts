import { describe, expect, it } from "vitest";

import { computeAspectMatrix } from "@/lib/chart/aspects";
import { buildHouses, houseNature, type BodyPositions } from "@/lib/chart/houses";
import { derivePosition } from "@/lib/chart/position";
import {
  STRENGTH_WEIGHTS,
  aspectScore,
  baseScore,
  bodyScore,
  chartYogas,
  houseStrength,
  houseYogas,
  lordScore,
  occupantScore,
  overallChartStrength,
  signScore,
  strengthCategory,
  strongestHouses,
  weakestHouses,
  type StrengthInput,
} from "@/lib/chart/strength";
import type { HouseStrength } from "@/lib/types/astro";

function chart(ascendant: number, bodies: BodyPositions): StrengthInput {
  return { houses: buildHouses(ascendant, bodies), bodies };
}

function ranked(house: number, total: number): HouseStrength {
  return {
    house,
    factors: { base: 0, lord: 0, occupant: 0, aspect: 0, sign: 0 },
    weights: { ...STRENGTH_WEIGHTS },
    total,
    category: strengthCategory(total),
    contributors: [],
  };
}

describe("factor scores", () => {
  it("scores house nature", () => {
    expect(baseScore(houseNature(1))).toBe(1);
    expect(baseScore(houseNature(4))).toBe(0.8);
    expect(baseScore(houseNature(5))).toBe(0.8);
    expect(baseScore(houseNature(3))).toBe(0.6);
    expect(baseScore(houseNature(6))).toBe(0.6);
    expect(baseScore(houseNature(8))).toBe(0.2);
    expect(baseScore(houseNature(2))).toBe(0.5);
  });

  it("averages element and quality for the sign", () => {
    expect(signScore(0)).toBeCloseTo(0.7, 10);
    expect(signScore(1)).toBeCloseTo(0.7, 10);
    expect(signScore(2)).toBeCloseTo(0.5, 10);
  });

  it("scores a single body by dignity, nature and motion", () => {
    expect(bodyScore(derivePosition("Jupiter", 95, 0, 0.1))).toBeCloseTo(1, 10);
    expect(bodyScore(derivePosition("Saturn", 5, 0, -0.1))).toBeCloseTo(0.05, 10);
    expect(bodyScore(derivePosition("Mercury", 70, 0, 1))).toBeCloseTo(0.8, 10);
  });

  it("averages occupants and defaults empty houses", () => {
    const input = chart(0, {
      Jupiter: derivePosition("Jupiter", 95, 0, 0.1),
      Saturn: derivePosition("Saturn", 100, 0, -0.1),
    });

    expect(occupantScore(input, 4)).toBeCloseTo(0.675, 10);
    expect(occupantScore(input, 2)).toBe(0.3);
  });

  it("weights incoming aspects by the aspecting body's nature", () => {
    const saturnOnly = chart(0, { Saturn: derivePosition("Saturn", 0, 0, 0.1) });
    expect(aspectScore(saturnOnly, 7)).toBeCloseTo(0.8, 10);
    expect(aspectScore(saturnOnly, 2)).toBe(0.3);

    const withJupiter = chart(0, {
      Jupiter: derivePosition("Jupiter", 0, 0, 0.1),
      Saturn: derivePosition("Saturn", 0, 0, 0.1),
    });
    expect(aspectScore(withJupiter, 7)).toBeCloseTo(1, 10);
    expect(aspectScore(withJupiter, 5)).toBe(1);
  });

  it("scales incoming aspects by their orb", () => {
    const wide = chart(0, { Saturn: derivePosition("Saturn", 5, 0, 0.1) });
    expect(aspectScore(wide, 7)).toBeCloseTo(0.4, 10);
  });

  it("scores aspects by orb whatever mode the matrix was built in", () => {
    const bodies = { Saturn: derivePosition("Saturn", 0, 0, 0.1) };
    const houses = buildHouses(200, bodies);

    const rasi = { houses, bodies, aspects: computeAspectMatrix(bodies, houses, "rasi") };
    const degree = { houses, bodies, aspects: computeAspectMatrix(bodies, houses, "degree") };

    expect(aspectScore(rasi, 1)).toBe(0.3);
    expect(aspectScore(degree, 1)).toBe(0.3);
    expect(aspectScore(chart(200, bodies), 1)).toBe(0.3);
  });

  it("scores zero when the lord is missing", () => {
    expect(lordScore(chart(0, {}), 1)).toBe(0);
  });
});

describe("houseStrength", () => {
  it("rates a dusthana with a debilitated lord as weak", () => {
    const input = chart(215, { Mercury: derivePosition("Mercury", 340, 0, 1) });
    const strength = houseStrength(input, 8);

    expect(input.houses[7].sign).toBe("Gemini");
    expect(strength.factors.base).toBe(0.2);
    expect(strength.factors.lord).toBeCloseTo(0.4, 10);
    expect(strength.factors.occupant).toBe(0.3);
    expect(strength.factors.aspect).toBe(0.3);
    expect(strength.factors.sign).toBeCloseTo(0.5, 10);
    expect(strength.total).toBeCloseTo(0.33, 10);
    expect(strength.category).toBe("Weak");
    expect(strength.contributors).toEqual(["Weak house nature", "Weak occupants", "Weak aspects"]);
  });

  it("penalizes a retrograde lord", () => {
    const input = chart(215, { Mercury: derivePosition("Mercury", 340, 0, -0.5) });
    const strength = houseStrength(input, 8);

    expect(strength.factors.lord).toBeCloseTo(0.3, 10);
    expect(strength.total).toBeCloseTo(0.3, 10);
    expect(strength.category).toBe("Weak");
  });

  it("buckets totals", () => {
    expect(strengthCategory(0.8)).toBe("Very Strong");
    expect(strengthCategory(0.79)).toBe("Strong");
    expect(strengthCategory(0.6)).toBe("Strong");
    expect(strengthCategory(0.4)).toBe("Moderate");
    expect(strengthCategory(0.2)).toBe("Weak");
    expect(strengthCategory(0.19)).toBe("Very Weak");
  });
});

describe("house ranking", () => {
  const strengths = [ranked(1, 0.5), ranked(2, 0.7), ranked(3, 0.7), ranked(4, 0.1)];

  it("breaks ties by house number", () => {
    expect(strongestHouses(strengths, 2)).toEqual([
      { house: 2, total: 0.7 },
      { house: 3, total: 0.7 },
    ]);
    expect(weakestHouses(strengths, 2)).toEqual([
      { house: 4, total: 0.1 },
      { house: 1, total: 0.5 },
    ]);
  });
});

describe("houseYogas", () => {
  const input = chart(0, {
    Sun: derivePosition("Sun", 95),
    Moon: derivePosition("Moon", 125),
  });

  it("finds kendra-trikona links and exchanges", () => {
    expect(houseYogas(input, 4)).toEqual([
      { kind: "kendra-trikona", house: 4, lord: "Moon", placedIn: 5 },
      { kind: "exchange", houses: [4, 5], lords: ["Moon", "Sun"] },
    ]);
    expect(houseYogas(input, 5)).toEqual([
      { kind: "kendra-trikona", house: 5, lord: "Sun", placedIn: 4 },
      { kind: "exchange", houses: [4, 5], lords: ["Moon", "Sun"] },
    ]);
  });

  it("does not pair a lord with itself", () => {
    const mars = chart(0, { Mars: derivePosition("Mars", 215) });
    expect(houseYogas(mars, 1)).toEqual([]);
  });

  it("lists conjunctions inside the house", () => {
    const conjoined = chart(0, {
      Sun: derivePosition("Sun", 95),
      Mercury: derivePosition("Mercury", 99),
    });

    expect(houseYogas(conjoined, 4)).toEqual([
      { kind: "conjunction", house: 4, bodies: ["Sun", "Mercury"], distance: 4, closeness: "Moderate" },
    ]);
  });
});

describe("chartYogas", () => {
  it("links the 2nd and 11th lords by exchange", () => {
    const yogas = chartYogas(
      chart(0, {
        Venus: derivePosition("Venus", 300),
        Saturn: derivePosition("Saturn", 40),
      }),
    );

    expect(yogas.dhana).toEqual([{ lords: ["Venus", "Saturn"], link: "exchange" }]);
    expect(yogas.byHouse[2]).toEqual([
      { kind: "exchange", houses: [2, 11], lords: ["Venus", "Saturn"] },
    ]);
    expect(yogas.raja).toEqual([]);
  });

  it("reports one body ruling both wealth houses", () => {
    const yogas = chartYogas(chart(125, { Mercury: derivePosition("Mercury", 200) }));
    expect(yogas.dhana).toEqual([{ lords: ["Mercury", "Mercury"], link: "same-body" }]);
  });

  it("collects raja yogas across houses", () => {
    const yogas = chartYogas(
      chart(0, {
        Sun: derivePosition("Sun", 95),
        Moon: derivePosition("Moon", 125),
      }),
    );

    expect(yogas.raja.map((yoga) => yoga.house)).toEqual([4, 5]);
  });
});

describe("overallChartStrength", () => {
  it("rates dignified bodies highly", () => {
    const bodies = { Sun: derivePosition("Sun", 10), Moon: derivePosition("Moon", 100) };
    expect(overallChartStrength(bodies, [])).toBe("Very Strong");
  });

  it("rates debilitated bodies poorly", () => {
    expect(overallChartStrength({ Saturn: derivePosition("Saturn", 5) }, [])).toBe("Very Weak");
  });
});
