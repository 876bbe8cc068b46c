/**
 * Edit distance between two strings (insert, delete, substitute).
 */
export function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Closest candidate within `maxDistance` edits, compared case-insensitively.
 */
export function suggest(input: string, candidates: string[], maxDistance = 3): string | undefined {
  const needle = input.toLowerCase();
  let best: string | undefined;
  let bestDistance = maxDistance + 1;
  for (const candidate of candidates) {
    const distance = levenshtein(needle, candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Lines printed for an unknown top-level command.
 */
export function unknownCommandMessage(input: string, candidates: string[], program = "gplay"): string[] {
  const match = suggest(input, candidates);
  return [
    match ? `Unknown command "${input}". Did you mean "${match}"?` : `Unknown command "${input}".`,
    `Run '${program} --help' for a list of commands.`,
  ];
}
