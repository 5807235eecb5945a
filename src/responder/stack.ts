import { FailureCause } from './context';

const FRAME_PATTERN = /^\s*at\s+(.+?)\s*$/;

/**
 * Stack frames of a failure, one entry per `at ...` line without the `at ` prefix
 *
 * The leading `Name: message` lines are skipped, so a message that itself
 * holds an `at ...` line is not read as a frame.
 */
export function stackFrames(failure: FailureCause | undefined): string[] {
  if (!failure?.stack) {
    return [];
  }

  const headerLines = (failure.message ?? '').split('\n').length;
  const frames: string[] = [];
  for (const line of failure.stack.split('\n').slice(headerLines)) {
    const match = FRAME_PATTERN.exec(line);
    if (match) {
      frames.push(match[1]);
    }
  }
  return frames;
}
