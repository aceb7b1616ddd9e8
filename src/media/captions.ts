/**
 * SRT caption file from narration cues laid end to end.
 */

export interface CaptionCue {
  text: string;
  durationSeconds: number;
}

/** `HH:MM:SS,mmm` */
export function formatSrtTimestamp(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const s = totalSeconds % 60;
  const m = Math.floor(totalSeconds / 60) % 60;
  const h = Math.floor(totalSeconds / 3600);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(ms, 3)}`;
}

export function buildSrt(cues: readonly CaptionCue[]): string {
  let cursor = 0;
  return cues.map((cue, i) => {
    const start = cursor;
    cursor += cue.durationSeconds;
    return `${i + 1}\n${formatSrtTimestamp(start)} --> ${formatSrtTimestamp(cursor)}\n${cue.text.trim()}\n`;
  }).join('\n');
}
