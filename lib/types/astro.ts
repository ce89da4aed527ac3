export type BodyName =
  | "Sun"
  | "Moon"
  | "Mars"
  | "Mercury"
  | "Jupiter"
  | "Venus"
  | "Saturn"
  | "Rahu"
  | "Ketu";

export type SignName =
  | "Aries"
  | "Taurus"
  | "Gemini"
  | "Cancer"
  | "Leo"
  | "Virgo"
  | "Libra"
  | "Scorpio"
  | "Sagittarius"
  | "Capricorn"
  | "Aquarius"
  | "Pisces";

export type Element = "Fire" | "Earth" | "Air" | "Water";
export type Quality = "Cardinal" | "Fixed" | "Mutable";
export type NaturalNature = "Benefic" | "Malefic" | "Neutral";

export type Dignity =
  | "Exalted"
  | "Exalted (exact)"
  | "Debilitated"
  | "Debilitated (exact)"
  | "Own Sign"
  | "Moolatrikona"
  | "Neutral";

export type Relationship = "Friend" | "Neutral" | "Enemy" | "Unknown";
export type AspectMode = "rasi" | "degree";
export type OrbCategory = "exact" | "close" | "wide" | "very_wide" | "none";
export type Division = "D1" | "D2" | "D3" | "D9" | "D10" | "D12";
export type MansionQuarter = 1 | 2 | 3 | 4;

export type StrengthCategory =
  | "Very Strong"
  | "Strong"
  | "Moderate"
  | "Weak"
  | "Very Weak";

export type DrishtiEffect =
  | "Very Auspicious"
  | "Auspicious"
  | "Mildly Auspicious"
  | "Neutral"
  | "Mildly Inauspicious"
  | "Inauspicious"
  | "Very Inauspicious"
  | "Extremely Inauspicious";

export type DignityTier =
  | "dignified"
  | "friendly"
  | "neutral"
  | "inimical"
  | "debilitated";

/** Raw state of a body as supplied by an ephemeris (tropical longitude). */
export interface RawPosition {
  longitude: number;
  latitude: number;
  speed: number;
}

export interface SignInfo {
  index: number;
  name: SignName;
  sanskrit: string;
  element: Element;
  quality: Quality;
  gender: "Male" | "Female";
  ruler: BodyName;
  exaltation: BodyName | null;
  debilitation: BodyName | null;
  friends: readonly BodyName[];
  enemies: readonly BodyName[];
}

export interface DegreeMark {
  sign: SignName;
  degree: number;
}

export interface DegreeSpan {
  sign: SignName;
  from: number;
  to: number;
}

export interface BodyInfo {
  name: BodyName;
  sanskrit: string;
  nature: NaturalNature;
  friends: readonly BodyName[];
  neutrals: readonly BodyName[];
  enemies: readonly BodyName[];
  owns: readonly SignName[];
  exaltation: DegreeMark;
  debilitation: DegreeMark;
  moolatrikona: DegreeSpan | null;
  /** Degrees counted forward from the body's own longitude. */
  aspectAngles: readonly number[];
  retrogradeSwaps: readonly (readonly [from: number, to: number])[];
  lunarNode: boolean;
}

export interface MansionInfo {
  index: number;
  name: string;
  lord: BodyName;
}

export interface HouseSignification {
  number: number;
  name: string;
  sanskrit: string;
  karaka: string;
  significations: string[];
}

export interface BodyPosition {
  body: BodyName;
  longitude: number;
  latitude: number;
  speed: number;
  retrograde: boolean;
  signIndex: number;
  sign: SignName;
  degreesInSign: number;
  mansionIndex: number;
  mansion: string;
  mansionLord: BodyName;
  degreesInMansion: number;
  quarter: MansionQuarter;
}

export interface HouseNature {
  kendra: boolean;
  trikona: boolean;
  upachaya: boolean;
  dusthana: boolean;
  maraka: boolean;
}

export interface House {
  number: number;
  cusp: number;
  signIndex: number;
  sign: SignName;
  degreesInSign: number;
  midpoint: number;
  junction: { start: number; end: number };
  lord: BodyName;
  occupants: BodyName[];
  nature: HouseNature;
  name: string;
  significations: string[];
}

export interface LordPlacement {
  house: number;
  lord: BodyName;
  placedInHouse: number;
  sign: SignName;
  dignity: Dignity;
  retrograde: boolean;
  distanceFromOwnHouse: number;
}

export type AspectTarget =
  | { kind: "body"; body: BodyName }
  | { kind: "house"; house: number };

export interface AspectMatch {
  angle: number;
  label: string;
  /** Distance from the exact aspect point; null for whole-sign aspects. */
  orb: number | null;
  category: Exclude<OrbCategory, "none">;
  strength: number;
  aspectedSign: SignName;
  dignity: Dignity;
  effect: string;
}

export interface AspectResult {
  source: BodyName;
  target: AspectTarget;
  mode: AspectMode;
  angularDistance: number;
  matches: AspectMatch[];
  primary: AspectMatch | null;
  orbCategory: OrbCategory;
  strength: number;
  totalStrength: number;
}

export interface AspectMatrix {
  mode: AspectMode;
  bodies: Partial<Record<BodyName, Partial<Record<BodyName, AspectResult>>>>;
  houses: Partial<Record<BodyName, AspectResult[]>>;
}

export type ConjunctionCloseness = "Very Close" | "Close" | "Moderate" | "Wide";

export interface Conjunction {
  bodies: [BodyName, BodyName];
  distance: number;
  closeness: ConjunctionCloseness;
}

export interface MutualAspect {
  bodies: [BodyName, BodyName];
  forward: AspectResult;
  reverse: AspectResult;
  combinedStrength: number;
}

export interface AspectSummary {
  totalAspects: number;
  averageStrength: number;
  byAngle: Record<string, number>;
  strong: AspectResult[];
  weak: AspectResult[];
  exact: AspectResult[];
  mostAspected: BodyName | null;
  mostAspecting: BodyName | null;
  conjunctions: Conjunction[];
  mutualAspects: MutualAspect[];
}

export type AspectInfluence =
  | "Predominantly Auspicious"
  | "Predominantly Inauspicious"
  | "Mixed Influences"
  | "No major aspects";

export interface HouseAspectSummary {
  house: number;
  aspects: AspectResult[];
  auspicious: number;
  inauspicious: number;
  neutral: number;
  strongest: AspectResult | null;
  influence: AspectInfluence;
}

export interface StrengthFactors {
  base: number;
  lord: number;
  occupant: number;
  aspect: number;
  sign: number;
}

export type StrengthFactor = keyof StrengthFactors;

export interface HouseStrength {
  house: number;
  factors: StrengthFactors;
  weights: StrengthFactors;
  total: number;
  category: StrengthCategory;
  contributors: string[];
}

export type HouseYoga =
  | {
      kind: "kendra-trikona";
      house: number;
      lord: BodyName;
      placedIn: number;
    }
  | {
      kind: "exchange";
      houses: [number, number];
      lords: [BodyName, BodyName];
    }
  | {
      kind: "conjunction";
      house: number;
      bodies: [BodyName, BodyName];
      distance: number;
      closeness: ConjunctionCloseness;
    };

export interface DhanaYoga {
  lords: [BodyName, BodyName];
  link: "same-body" | "conjunction" | "exchange" | "mutual-aspect";
}

export interface ChartYogas {
  byHouse: Record<number, HouseYoga[]>;
  raja: Extract<HouseYoga, { kind: "kendra-trikona" }>[];
  dhana: DhanaYoga[];
}

export interface ChartBody extends BodyPosition {
  dignity: Dignity;
  nature: NaturalNature;
  house: number | null;
  inJunction: boolean;
  divisional: Record<Division, SignName>;
}

export interface PointPosition {
  longitude: number;
  signIndex: number;
  sign: SignName;
  degreesInSign: number;
}

export interface AscendantInfo extends PointPosition {
  source: "ephemeris" | "fallback";
  mansion: string;
  quarter: MansionQuarter;
}

export interface SpecialPoints {
  midheaven: PointPosition | null;
  partOfFortune: PointPosition | null;
}

export interface ChartSummary {
  ascendantSign: SignName | null;
  dignifiedBodies: string[];
  strongestHouses: Array<{ house: number; total: number }>;
  weakestHouses: Array<{ house: number; total: number }>;
  overallStrength: StrengthCategory;
}

export interface ChartContext {
  utc: string;
  julianDay: number;
  latitude: number;
  longitude: number;
  ayanamsaSystem: string;
  ayanamsa: number;
  aspectMode: AspectMode;
  conjunctionOrb: number;
  status: "complete" | "incomplete";
  missingBodies: BodyName[];
  ascendant: AscendantInfo | null;
  bodies: Partial<Record<BodyName, ChartBody>>;
  houses: House[];
  lordPlacements: Partial<Record<number, LordPlacement>>;
  strengths: HouseStrength[];
  yogas: ChartYogas;
  aspects: AspectMatrix | null;
  specialPoints: SpecialPoints;
  summary: ChartSummary;
}
