/** Characters with a meaning in a pattern */
const RE_METACHARS = /[.*+?^${}()|[\]\\]/g;

/** Pattern source that matches `text` literally */
export function quote(text: string): string {
  return text.replace(RE_METACHARS, "\\$&");
}

/** Replacement string that inserts `text` literally (`$` becomes `$$`) */
export function quoteReplacement(text: string): string {
  return text.replace(/\$/g, "$$$$");
}
