export interface LanguageConfig {
  id: string;
  extensions: string[];
}

/** Source dialects the scanner reads. Plain JavaScript is out of scope. */
export const LANGUAGES: Record<string, LanguageConfig> = {
  typescript: {
    id: "typescript",
    extensions: [".ts"],
  },
  tsx: {
    id: "tsx",
    extensions: [".tsx"],
  },
};

export function getSupportedExtensions(): string[] {
  return Object.values(LANGUAGES).flatMap((lang) => lang.extensions);
}
