import { MalformedMarkerError, NoMarkerFoundError } from "../errors.js";

/** Sentinel lines delimiting the region of a file this tool may rewrite. */
export interface MarkerPair {
  begin: string;
  end: string;
}

export interface MarkerLocation {
  /** Line index of the begin marker. */
  beginLine: number;
  /** Line index of the end marker. */
  endLine: number;
}

export function verilogMarkers(tag: string): MarkerPair {
  return { begin: `// BEGIN ${tag} (generated)`, end: `// END ${tag} (generated)` };
}

export function hashMarkers(tag: string): MarkerPair {
  return { begin: `# BEGIN ${tag} (generated)`, end: `# END ${tag} (generated)` };
}

/** Lines of `text` with the terminator each one ended with ("" for the last). */
function splitLines(text: string): { lines: string[]; terminators: string[] } {
  const parts = text.split(/(\r?\n)/);
  const lines: string[] = [];
  const terminators: string[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    lines.push(parts[i]);
    terminators.push(i + 1 < parts.length ? parts[i + 1] : "");
  }
  return { lines, terminators };
}

function indicesOf(lines: readonly string[], marker: string): number[] {
  const found: number[] = [];
  lines.forEach((line, index) => {
    if (line.trim() === marker) found.push(index);
  });
  return found;
}

/**
 * Finds the marker pair in `lines`. A marker is a whole line, compared after
 * trimming, so it may be indented like the code around it.
 */
export function locateMarkers(lines: readonly string[], markers: MarkerPair): MarkerLocation {
  const begin = markers.begin.trim();
  const end = markers.end.trim();
  if (begin.length === 0 || end.length === 0 || begin === end) {
    throw new MalformedMarkerError("begin and end markers must be distinct, non-empty lines");
  }

  const begins = indicesOf(lines, begin);
  const ends = indicesOf(lines, end);
  if (begins.length === 0 || ends.length === 0) {
    const missing = begins.length === 0 && ends.length === 0 ? "both" : begins.length === 0 ? "begin" : "end";
    throw new NoMarkerFoundError(missing, markers);
  }
  if (begins.length > 1) {
    throw new MalformedMarkerError(`'${begin}' appears ${begins.length} times`);
  }
  if (ends.length > 1) {
    throw new MalformedMarkerError(`'${end}' appears ${ends.length} times`);
  }
  if (begins[0] > ends[0]) {
    throw new MalformedMarkerError(`'${begin}' comes after '${end}'`);
  }
  return { beginLine: begins[0], endLine: ends[0] };
}

/**
 * Replaces the lines strictly between the markers with `fragment` and leaves
 * everything else, each line's own ending included, as it was. Applying the same
 * fragment again gives the same text. Throws without producing any partial
 * result when the markers are missing or malformed.
 *
 * Callers patching the same file concurrently must serialize the
 * read-apply-write sequence themselves.
 */
export function applyPatch(existingText: string, fragment: string, markers: MarkerPair): string {
  const { lines, terminators } = splitLines(existingText);
  const { beginLine, endLine } = locateMarkers(lines, markers);

  const body = fragment.replace(/\r?\n$/, "");
  const fragmentLines = body.length === 0 ? [] : body.split(/\r?\n/);
  const clash = fragmentLines.find((line) => line.trim() === markers.begin.trim() || line.trim() === markers.end.trim());
  if (clash !== undefined) {
    throw new MalformedMarkerError(`fragment contains the marker line '${clash.trim()}'`);
  }

  // Fragment lines take the begin marker's line ending; everything else keeps its own.
  const eol = terminators[beginLine];
  let result = "";
  for (let i = 0; i <= beginLine; i += 1) {
    result += lines[i] + terminators[i];
  }
  for (const line of fragmentLines) {
    result += line + eol;
  }
  for (let i = endLine; i < lines.length; i += 1) {
    result += lines[i] + terminators[i];
  }
  return result;
}

/** Alias of {@link applyPatch} for patching any externally owned file's text. */
export const patchFile = applyPatch;
