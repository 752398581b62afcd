/** Local README filenames, checked in this order (exact case) */
export const README_FILENAMES: readonly string[] = ["README.md", "README.rst", "README.txt", "README"];

/** Raw-content host for GitHub repositories */
export const GITHUB_RAW_BASE_URL = "https://raw.githubusercontent.com";

/** Hugging Face serves raw files from the hub host itself */
export const HUGGINGFACE_BASE_URL = "https://huggingface.co";

/** Host used for the final generic guess when a descriptor names none */
export const DEFAULT_HOSTS = {
  github: "github.com",
  huggingface: "huggingface.co",
} as const;

/** Ref used by the final generic guess */
export const GENERIC_FALLBACK_REF = "HEAD";

// ---------------------------------------------------------------------------
// Scoring heuristics
// ---------------------------------------------------------------------------

/**
 * Word-count bands, ascending. The first band whose `below` exceeds the
 * count wins; counts past the last cutoff score LONG_TEXT_SCORE.
 */
export const LENGTH_BANDS: readonly { readonly below: number; readonly score: number }[] = [
  { below: 5, score: 0 },
  { below: 100, score: 0.1 },
  { below: 300, score: 0.25 },
];

export const LONG_TEXT_SCORE = 0.4;

export const INSTALLATION_SCORE = 0.35;

export const CODE_SNIPPET_SCORE = 0.25;

/** Matched case-insensitively as substrings */
export const INSTALL_PHRASES: readonly string[] = [
  "pip install",
  "pip3 install",
  "conda install",
  "docker",
  "npm install",
  "npm i ",
  "yarn add",
  "pnpm add",
  "cargo install",
  "cargo add",
  "go get",
  "go install",
  "brew install",
  "apt-get install",
  "gem install",
  "poetry add",
];

/** Markdown heading starting with "Install", or a bare "Installation" title line (RST, plain text) */
export const INSTALL_HEADING_PATTERNS: readonly RegExp[] = [
  /^#{1,6}[ \t]*install/im,
  /^[ \t]*installation[ \t]*:?[ \t]*$/im,
];

export const CODE_FENCE = "```";

/** A line starting with four spaces or a tab */
export const INDENTED_CODE_PATTERN = /^(?: {4}|\t)/m;
