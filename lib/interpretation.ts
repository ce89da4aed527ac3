import { houseAspectSummary } from "@/lib/chart/aspects";
import { formatOrdinalHouse, formatSignPosition, toTitleCase } from "@/lib/formatters";
import type { ChartContext, House, HouseYoga } from "@/lib/types/astro";

export interface InterpretationItem {
  title: string;
  body: string;
  tags: string[];
}

export interface InterpretationSection {
  key: string;
  title: string;
  items: InterpretationItem[];
}

function describeYoga(yoga: HouseYoga): InterpretationItem {
  switch (yoga.kind) {
    case "kendra-trikona":
      return {
        title: "Kendra-Trikona Yoga",
        body: `${yoga.lord}, lord of the ${formatOrdinalHouse(yoga.house)}, is placed in the ${formatOrdinalHouse(yoga.placedIn)}.`,
        tags: ["yoga", yoga.kind],
      };
    case "exchange":
      return {
        title: "Exchange Yoga",
        body: `${yoga.lords[0]} and ${yoga.lords[1]} exchange the ${formatOrdinalHouse(yoga.houses[0])} and ${formatOrdinalHouse(yoga.houses[1])}.`,
        tags: ["yoga", yoga.kind],
      };
    case "conjunction":
      return {
        title: "Conjunction",
        body: `${yoga.bodies[0]} and ${yoga.bodies[1]} are ${yoga.distance.toFixed(2)}° apart (${yoga.closeness}).`,
        tags: ["yoga", yoga.kind, yoga.closeness.toLowerCase().replaceAll(" ", "-")],
      };
  }
}

function buildHouseSection(context: ChartContext, house: House): InterpretationSection {
  const strength = context.strengths.find((entry) => entry.house === house.number);
  const items: InterpretationItem[] = [
    {
      title: "Significations",
      body: `${formatSignPosition(house.sign, house.degreesInSign)}, ruled by ${house.lord}. ${house.significations.join(", ")}.`,
      tags: Object.entries(house.nature)
        .filter(([, active]) => active)
        .map(([nature]) => nature),
    },
  ];

  if (house.occupants.length > 0) {
    items.push({
      title: "Occupants",
      body: house.occupants.join(", "),
      tags: ["occupants"],
    });
  }

  if (strength) {
    items.push({
      title: `Strength: ${strength.category}`,
      body: `Score ${strength.total.toFixed(2)}.${
        strength.contributors.length > 0 ? ` ${strength.contributors.join(", ")}.` : ""
      }`,
      tags: ["strength"],
    });
  }

  for (const yoga of context.yogas.byHouse[house.number] ?? []) {
    items.push(describeYoga(yoga));
  }

  if (context.aspects) {
    const summary = houseAspectSummary(context.aspects, context.houses, house.number);
    items.push({
      title: `Aspects: ${summary.influence}`,
      body:
        summary.aspects.length > 0
          ? `Aspected by ${summary.aspects.map((result) => result.source).join(", ")}.`
          : "No body aspects this house.",
      tags: ["aspects"],
    });
  }

  return {
    key: `house_${house.number}`,
    title: `${toTitleCase(formatOrdinalHouse(house.number))}: ${house.name}`,
    items,
  };
}

export function buildInterpretationSections(context: ChartContext): InterpretationSection[] {
  return context.houses.map((house) => buildHouseSection(context, house));
}
