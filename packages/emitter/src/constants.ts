/**
 * Shared constants for the conversion emitter
 */

export const INDENT = "  ";

/**
 * Header for a generated conversion module. No timestamp unless asked, so
 * repeated runs produce identical text.
 */
export const generateFileHeader = (
  sourceName: string | undefined,
  options: {
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  } = {}
): string => {
  const lines: string[] = [];

  lines.push(
    sourceName !== undefined
      ? `// Generated by wirebridge from: ${sourceName}`
      : "// Generated by wirebridge"
  );

  if (options.includeTimestamp ?? false) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Generated at: ${timestamp}`);
  }

  lines.push("// WARNING: Do not modify this file manually");

  return lines.join("\n");
};
