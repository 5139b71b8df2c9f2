export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_LLM_TIMEOUT_MS = 60000;
export const DEFAULT_TONE = "professional";
export const DEFAULT_AUDIENCE = "general";
export const DEFAULT_THEME = "professional";

// Model Constants
export const MODEL_ILLUSTRATION_CONTENT = "gemini-2.5-flash";

// Models that accept responseSchema alongside responseMimeType
export const STRUCTURED_OUTPUT_MODELS = [
  "gemini-2.5-flash",
  "gemini-2.5-pro",
  "gemini-2.5-flash-lite",
  "gemini-2.0-flash",
  "gemini-2.0-flash-lite",
];

export const EXCERPT_LENGTH = 50;

// Matches {identifier} tokens; template attributes never contain braces.
export const PLACEHOLDER_PATTERN = /\{([A-Za-z0-9_]+)\}/g;

export const THEME_PLACEHOLDER_PREFIX = "theme_";

export const EMPHASIS_GUIDELINES = `
EMPHASIS MARKUP:
- Wrap 1-2 key words per description or bullet in <strong></strong> tags.
- Do not use any other markup, Markdown or bullet characters.
- HTML tags do NOT count toward character limits; spaces DO count.
`;
