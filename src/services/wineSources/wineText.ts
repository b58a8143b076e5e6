import { containsPhrase, normalizeForMatch } from "../../utils/normalize.js";
import type { KnownWineType } from "../../types/contracts.js";

// Longer names first so "Castilla La Mancha" wins over "La Mancha".
const REGIONS = [
  "Ribera del Duero",
  "Rías Baixas",
  "Castilla La Mancha",
  "Campo de Borja",
  "Utiel-Requena",
  "Ribeira Sacra",
  "La Mancha",
  "Rioja",
  "Rueda",
  "Priorat",
  "Penedès",
  "Jumilla",
  "Toro",
  "Navarra",
  "Valdepeñas",
  "Cariñena",
  "Somontano",
  "Bierzo",
  "Yecla",
  "Valdeorras",
  "Cigales",
  "Montsant",
  "Alicante",
  "Valencia"
] as const;

const GRAPES = [
  "Cabernet Sauvignon",
  "Sauvignon Blanc",
  "Tinta de Toro",
  "Tinto Fino",
  "Tempranillo",
  "Garnacha",
  "Monastrell",
  "Mencía",
  "Bobal",
  "Graciano",
  "Mazuelo",
  "Syrah",
  "Merlot",
  "Albariño",
  "Verdejo",
  "Godello",
  "Viura",
  "Macabeo",
  "Xarel·lo",
  "Parellada",
  "Chardonnay",
  "Moscatel",
  "Airén"
] as const;

const WINE_TYPE_WORDS: ReadonlyArray<[string, KnownWineType]> = [
  ["tinto", "tinto"],
  ["blanco", "blanco"],
  ["rosado", "rosado"],
  ["cava", "cava"],
  ["espumoso", "espumoso"]
];

const NORMALIZED_REGIONS = REGIONS.map((region) => [normalizeForMatch(region), region] as const);
const NORMALIZED_GRAPES = GRAPES.map((grape) => [normalizeForMatch(grape), grape] as const);

const DO_PATTERN = /D\.O\.?\s+([A-Za-zÀ-ÿ\s-]+?)(?:\s+(?:botella|brik|bag|pack|\d)|$)/i;

export function extractRegion(name: string): string | undefined {
  const normalized = normalizeForMatch(name);
  for (const [needle, region] of NORMALIZED_REGIONS) {
    if (containsPhrase(normalized, needle)) {
      return region;
    }
  }

  const match = name.match(DO_PATTERN);
  const region = match?.[1]?.trim();
  return region ? region : undefined;
}

/** "D.O. Rioja" / "D.o. Rioja" / "D.O.Ca. Rioja" style category names. */
export function regionFromCategory(categoryName: string): string | undefined {
  const match = categoryName.match(/^\s*D\.o\.?(?:Ca\.?|Q\.?)?\s+(.+)$/i);
  const region = match?.[1]?.trim();
  return region ? region : undefined;
}

export function extractGrape(name: string): string | undefined {
  const normalized = normalizeForMatch(name);
  for (const [needle, grape] of NORMALIZED_GRAPES) {
    if (containsPhrase(normalized, needle)) {
      return grape;
    }
  }
  return undefined;
}

export function extractWineType(name: string): KnownWineType | undefined {
  const normalized = normalizeForMatch(name);
  for (const [word, wineType] of WINE_TYPE_WORDS) {
    if (containsPhrase(normalized, word)) {
      return wineType;
    }
  }
  return undefined;
}

/**
 * DIA names read like "Vino tinto crianza D.O. Rioja Campo Viejo botella 75 cl";
 * the brand is what remains after the descriptors are removed.
 */
export function extractDiaBrand(name: string): string {
  let clean = name.replace(/\s*(botella|brik|bag|pack)\s+\d+.*$/i, "");
  clean = clean.replace(/D\.O\.?\s+[A-Za-zÀ-ÿ\s]+?(?=\s+[A-Z]|\s*$)/, "");
  clean = clean.replace(/^Vino\s+(tinto|blanco|rosado|espumoso)\s*(crianza|reserva|gran reserva|joven|roble)?\s*/i, "");
  const brand = clean.replace(/\s+/g, " ").trim();
  if (brand) {
    return brand;
  }
  return name.trim().split(/\s+/)[0] || "DIA";
}

/** "4,72 €" → 4.72, "(6,29 €/LITRO)" → 6.29. */
export function parseSpanishPrice(text: string): number | null {
  const decimal = text.match(/(\d+[.,]\d+)/);
  if (decimal?.[1]) {
    return Number(decimal[1].replace(",", "."));
  }
  const integer = text.match(/(\d+)/);
  if (integer?.[1]) {
    return Number(integer[1]);
  }
  return null;
}
