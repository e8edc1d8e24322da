export type Language = "it" | "en";

export const DEFAULT_LANGUAGE: Language = "it";

export const translations = {
  it: {
    pageTitle: "Riepilogo Sportivo Giornaliero del",
    intro: "Riepilogo automatico (eventi + notizie selezionate)."
  },
  en: {
    pageTitle: "Daily Sports Briefing for",
    intro: "Automatic briefing (events + selected news)."
  }
} as const;

export function t(language: Language, key: keyof typeof translations.it): string {
  return translations[language][key];
}

export function buildPageTitle(date: string, language: Language): string {
  return `${t(language, "pageTitle")} ${date}`;
}
