export interface ParsedInput {
  command: string;
  args: string[];
}

/** Splits a line on whitespace; only the command word is lower-cased. */
export function parseInput(line: string): ParsedInput | null {
  const tokens = line.split(/\s+/).filter(Boolean);
  if (tokens.length === 0) return null;

  const [command, ...args] = tokens;
  return { command: command.toLowerCase(), args };
}
