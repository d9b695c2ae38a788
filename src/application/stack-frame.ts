import { fileURLToPath } from 'node:url';

export interface StackLocation {
  readonly file_name: string;
  readonly line_number: number;
}

// "    at fn (/path/file.ts:10:5)" or "    at /path/file.ts:10:5"
const FRAME_PATTERN = /^\s*at (?:.*? \()?([^()]+?):(\d+):(\d+)\)?$/;

function toPath(location: string): string {
  if (!location.startsWith('file://')) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

/**
 * Finds the first application frame in a V8 stack trace.
 *
 * Frames from Node internals (`node:`) are skipped so the location points
 * at the code that threw, not at the runtime plumbing around it.
 */
export function firstStackLocation(stack: string | null | undefined): StackLocation | null {
  if (!stack) return null;

  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) continue;

    const [, rawFile, rawLine] = match;
    if (rawFile === undefined || rawLine === undefined) continue;
    if (rawFile.startsWith('node:') || rawFile === '<anonymous>') continue;

    return { file_name: toPath(rawFile), line_number: Number(rawLine) };
  }

  return null;
}
