const languageOf = (locale: string): string => locale.slice(0, 2).toLowerCase();

/**
 * Whether a locale block written for `candidate` applies when rendering in
 * `requested`. A block without a language applies everywhere, and a bare
 * language (`de`) matches all of its dialects (`de-AT`, `de-DE`).
 */
export const isLocaleCompatible = (candidate: string | undefined, requested: string): boolean => {
  if (candidate === undefined || candidate === "") {
    return true;
  }
  if (candidate === requested) {
    return true;
  }
  return (candidate.length === 2 || requested.length === 2) && languageOf(candidate) === languageOf(requested);
};
