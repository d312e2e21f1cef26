/**
 * RxNorm term grammars.
 *
 * SBDC terms read "<ingredient> <strength> / <ingredient> <strength> [<brand>]",
 * SBDF terms read "<ingredient> <dose form> [<brand>]".
 */

const STRENGTH_PATTERN = /(\d*)(\d*\.)?\d+ (MG|UNT|ML)?(\/(ML|HR|MG))?/g;

export type BrandedDrugComponent = {
  ingredients: string[];
  brand: string;
};

export type BrandedDrugForm = {
  ingredient: string;
  brand: string;
};

export function stripStrengths(term: string): string {
  return term.replace(STRENGTH_PATTERN, '');
}

/** Text inside the last bracket group, or null when there is none. */
export function extractBrand(term: string): string | null {
  const open = term.lastIndexOf('[');
  if (open === -1) {
    return null;
  }
  const close = term.indexOf(']', open);
  const brand = term.slice(open + 1, close === -1 ? undefined : close).trim();
  return brand || null;
}

function removeLastBracketGroup(term: string): string {
  const open = term.lastIndexOf('[');
  if (open === -1) {
    return term;
  }
  const close = term.indexOf(']', open);
  return close === -1 ? term.slice(0, open) : term.slice(0, open) + term.slice(close + 1);
}

export function parseBrandedDrugComponent(term: string): BrandedDrugComponent | null {
  const brand = extractBrand(term);
  if (brand === null) {
    return null;
  }

  const ingredients = removeLastBracketGroup(stripStrengths(term))
    .split('/')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  return ingredients.length > 0 ? { ingredients, brand } : null;
}

/** Removes the longest dose form found in the term; null when none matches. */
export function parseBrandedDrugForm(
  term: string,
  drugForms: readonly string[],
): BrandedDrugForm | null {
  const brand = extractBrand(term);
  if (brand === null) {
    return null;
  }

  const remainder = removeLastBracketGroup(stripStrengths(term));
  let matchedForm: string | null = null;
  for (const form of drugForms) {
    if (form && remainder.includes(form) && (matchedForm === null || form.length > matchedForm.length)) {
      matchedForm = form;
    }
  }
  if (matchedForm === null) {
    return null;
  }

  const ingredient = remainder.replace(matchedForm, '').trim();
  return ingredient ? { ingredient, brand } : null;
}
