export type ParsedTermSize = {
  rows: number;
  cols: number;
};

/**
 * Parse `ROWSxCOLS`. Either side may be 0, meaning "follow the window".
 * Angle brackets around the size are accepted (`<24x80>`).
 */
export function parseTermSize(raw: string): ParsedTermSize | undefined {
  const match = /^<?\s*(\d+)\s*[xX*]\s*(\d+)\s*>?$/.exec(raw.trim());
  if (!match) return undefined;
  const rows = parseInt(match[1], 10);
  const cols = parseInt(match[2], 10);
  if (!Number.isFinite(rows) || !Number.isFinite(cols)) return undefined;
  return { rows, cols };
}

export type ParsedOpenArgs = {
  command: string;
  rows?: number;
  cols?: number;
  error?: string;
};

/**
 * Parse the argument text of the "open terminal" command:
 *
 *   [ROWSxCOLS | <ROWSxCOLS> | --size=ROWSxCOLS | --size ROWSxCOLS] [command...]
 *
 * The command keeps its original spacing; an empty command means "the shell".
 */
export function parseOpenArgs(raw: string): ParsedOpenArgs {
  let rest = raw.trimStart();
  let sizeText: string | undefined;

  const flagMatch = /^--size(?:=|\s+)(\S+)\s*/.exec(rest);
  if (flagMatch) {
    sizeText = flagMatch[1];
    rest = rest.slice(flagMatch[0].length);
  } else {
    const leadMatch = /^(<?\d+[xX*]\d+>?)(?:\s+|$)/.exec(rest);
    if (leadMatch) {
      sizeText = leadMatch[1];
      rest = rest.slice(leadMatch[0].length);
    }
  }

  const command = rest.trim();
  if (sizeText === undefined) {
    return { command };
  }

  const size = parseTermSize(sizeText);
  if (!size) {
    return { command, error: `Invalid terminal size '${sizeText}'` };
  }

  return {
    command,
    rows: size.rows > 0 ? size.rows : undefined,
    cols: size.cols > 0 ? size.cols : undefined,
  };
}
