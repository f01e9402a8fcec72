export const SOURCE_LANGUAGE = "en";

const LANGUAGE_NAMES: Record<string, string> = {
  en: "English",
  sr: "Serbian",
  fr: "French",
  es: "Spanish",
  de: "German",
  ru: "Russian",
  zh: "Chinese (Simplified)",
  ja: "Japanese",
  pt: "Portuguese",
  it: "Italian"
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}
