import type { Product } from "../types/contracts.js";
import { containsPhrase, normalizeForMatch } from "../utils/normalize.js";

// Wine searches also surface groceries that merely mention "reserva", "rioja"
// or "vino" (cured ham, cheese, cooking wine, spirits). Matching is on whole
// words of the accent-stripped name and brand.
export const DEFAULT_EXCLUDED_TERMS: readonly string[] = [
  "jamón",
  "jamon",
  "ham",
  "paleta",
  "paletilla",
  "lomo",
  "chorizo",
  "salchichón",
  "fuet",
  "sandwich",
  "queso",
  "cheese",
  "pâté",
  "paté",
  "aceite",
  "oil",
  "vinagre",
  "vinegar",
  "conserva",
  "lata",
  "atún",
  "tuna",
  "bonito",
  "anchoa",
  "anchoas",
  "sardina",
  "sardinas",
  "mejillón",
  "mejillones",
  "berberecho",
  "berberechos",
  "cerveza",
  "beer",
  "ron",
  "rum",
  "whisky",
  "ginebra",
  "gin",
  "vodka",
  "brandy",
  "licor",
  "vermut",
  "sangría",
  "tinto de verano",
  "vino de cocina",
  "para cocinar",
  "salsa",
  "caldo",
  "vaso",
  "vasos",
  "copa",
  "copas",
  "sacacorchos"
];

export type ExclusionFilter = {
  isExcluded(product: Pick<Product, "name" | "brand">): boolean;
};

export function createExclusionFilter(terms: readonly string[] = DEFAULT_EXCLUDED_TERMS): ExclusionFilter {
  const needles = Array.from(new Set(terms.map(normalizeForMatch).filter((term) => term.length > 0)));

  return {
    isExcluded(product) {
      const haystack = normalizeForMatch(`${product.name} ${product.brand}`);
      return needles.some((needle) => containsPhrase(haystack, needle));
    }
  };
}

const defaultFilter = createExclusionFilter();

export function isExcluded(product: Pick<Product, "name" | "brand">): boolean {
  return defaultFilter.isExcluded(product);
}

export function excludeProducts(
  products: readonly Product[],
  filter: ExclusionFilter = defaultFilter
): { kept: Product[]; excluded: number } {
  const kept = products.filter((product) => !filter.isExcluded(product));
  return { kept, excluded: products.length - kept.length };
}
