export interface Theme {
  // Surfaces
  bg: string;
  bgAlt: string;
  // Text
  text: string;
  textMuted: string;
  // Borders
  border: string;
  // Inline
  link: string;
  // Overlap: matched chunks
  matchedBg: string;
  matchedText: string;
  matchedBorder: string;
  // Overlap: unmatched chunks
  unmatchedBg: string;
  unmatchedText: string;
  // Summary cells by score band
  scoreHighBg: string;
  scoreMidBg: string;
  scoreLowBg: string;
  selfCellBg: string;
  // Scrollbar
  scrollTrack: string;
  scrollThumb: string;
  scrollThumbHover: string;
}

// ── Dark theme ───────────────────────────────────────────────────
// Warm charcoal grays, not blue-tinted, not pure black
export const dark: Theme = {
  bg: "#2b2b2b",
  bgAlt: "#232323",
  text: "#d4d4d4",
  textMuted: "#a0a0a0",
  border: "#3e3e3e",
  link: "#7eb8da",
  matchedBg: "rgba(212, 115, 128, 0.22)",
  matchedText: "#f0b4bc",
  matchedBorder: "rgba(212, 115, 128, 0.6)",
  unmatchedBg: "transparent",
  unmatchedText: "#d4d4d4",
  scoreHighBg: "rgba(212, 115, 128, 0.35)",
  scoreMidBg: "rgba(212, 160, 87, 0.25)",
  scoreLowBg: "rgba(107, 197, 126, 0.14)",
  selfCellBg: "#353535",
  scrollTrack: "#2b2b2b",
  scrollThumb: "#4a4a4a",
  scrollThumbHover: "#5a5a5a",
};

// ── Solar theme ──────────────────────────────────────────────────
// Kindle / e-ink warm sepia
export const solar: Theme = {
  bg: "#faf4e8",
  bgAlt: "#f0e8d6",
  text: "#433422",
  textMuted: "#7a6b57",
  border: "#d9ccb4",
  link: "#3b7a8c",
  matchedBg: "rgba(181, 90, 90, 0.16)",
  matchedText: "#7e2f2f",
  matchedBorder: "rgba(181, 90, 90, 0.5)",
  unmatchedBg: "transparent",
  unmatchedText: "#433422",
  scoreHighBg: "rgba(181, 90, 90, 0.25)",
  scoreMidBg: "rgba(181, 138, 59, 0.2)",
  scoreLowBg: "rgba(90, 138, 59, 0.12)",
  selfCellBg: "#ede5d3",
  scrollTrack: "#faf4e8",
  scrollThumb: "#c4b598",
  scrollThumbHover: "#b0a488",
};

export const themes = { dark, solar } as const;
export type ThemeName = keyof typeof themes;

export function isThemeName(name: string): name is ThemeName {
  return name in themes;
}

/** Generate CSS custom-property declarations for a theme. */
export function themeVars(t: Theme): string {
  return Object.entries(t)
    .map(([k, v]) => `--do-${camel2kebab(k)}: ${v};`)
    .join("\n    ");
}

function camel2kebab(s: string): string {
  return s.replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`);
}
