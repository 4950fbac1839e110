const pad = (n: number) => n.toString().padStart(2, '0');

/** Formats seconds as H:MM:SS or M:SS. Zero or negative durations are live streams. */
export function formatDuration(seconds: number): string {
  if (seconds <= 0) return 'Live';

  const total = Math.floor(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return `${hours}:${pad(minutes)}:${pad(secs)}`;
  }
  return `${minutes}:${pad(secs)}`;
}

// Elapsed time is never live; zero is just the start
const formatElapsed = (seconds: number) => (seconds <= 0 ? '0:00' : formatDuration(seconds));

export function renderProgressBar(elapsed: number, total: number, width = 20): string {
  if (total <= 0) {
    return `[${'='.repeat(width)}] Live`;
  }

  const progress = Math.min(Math.max(elapsed / total, 0), 1);
  const filled = Math.floor(width * progress);
  const bar = filled < width
    ? '='.repeat(filled) + '>' + ' '.repeat(width - filled - 1)
    : '='.repeat(width);

  return `[${bar}] ${formatElapsed(elapsed)} / ${formatDuration(total)}`;
}
