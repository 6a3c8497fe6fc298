// Shared line segmentation for statement formats

export interface MarkerOptions {
  opening: RegExp;
  closing: RegExp;
  noise?: RegExp[];
}

function isNoise(line: string, noise: RegExp[]): boolean {
  return noise.some((pattern) => pattern.test(line));
}

/**
 * Candidate lines for layouts without section markers:
 * every non-blank line that is not a header, footer or page marker.
 */
export function filterNoise(lines: string[], noise: RegExp[] = []): string[] {
  const candidates: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    if (isNoise(line, noise)) continue;
    candidates.push(line);
  }
  return candidates;
}

/**
 * Candidate lines for layouts that wrap transactions between an opening
 * and a closing marker line. Windows may repeat (one per page); the marker
 * lines themselves are never candidates. A window left open runs to the
 * end of the document.
 */
export function segmentByMarkers(lines: string[], options: MarkerOptions): string[] {
  const noise = options.noise ?? [];
  const candidates: string[] = [];
  let inSection = false;

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (options.opening.test(line)) {
      inSection = true;
      continue;
    }
    if (options.closing.test(line)) {
      inSection = false;
      continue;
    }
    if (!inSection) continue;
    if (isNoise(line, noise)) continue;

    candidates.push(line);
  }

  return candidates;
}

// "Page 2 of 5", "Page 3"
export const PAGE_MARKER = /\bpage\s+\d+(\s+of\s+\d+)?\b/i;
