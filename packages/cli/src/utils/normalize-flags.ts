const FLAG_ALIASES: Record<string, string> = {
  "--m": "--milis",
  "--mili": "--milis",
  "--milliseconds": "--milis",
  "--u": "--utc",
  "--i": "--iso",
};

const KNOWN_FLAGS = new Set([
  "-h",
  "--help",
  "-m",
  "--milis",
  "-u",
  "--utc",
  "-i",
  "--iso",
]);

function isFlag(token: string): boolean {
  return token.startsWith("-");
}

/**
 * Flags are case-insensitive and accept a few historical spellings; commander
 * only knows the canonical ones.
 */
export function normalizeFlags(argv: readonly string[]): string[] {
  return argv.map((token) => {
    if (!isFlag(token)) {
      return token;
    }
    const lowered = token.toLowerCase();
    return FLAG_ALIASES[lowered] ?? lowered;
  });
}

export function hasHelpFlag(argv: readonly string[]): boolean {
  return argv.some((token) => token === "-h" || token === "--help");
}

/**
 * Every token starting with `-` must be one of the listed flags, so a bare
 * `--`, combined short flags like `-mu` and negative numbers are all
 * rejected. Expects normalized tokens.
 */
export function findUnknownFlag(argv: readonly string[]): string | undefined {
  return argv.find((token) => isFlag(token) && !KNOWN_FLAGS.has(token));
}
