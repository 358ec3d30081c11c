const ISO_DURATION = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/** Parses an ISO-8601 time duration such as `PT1H2M3S` into seconds. Unparseable input yields 0. */
export function parseIsoDuration(value: string | null | undefined): number {
  if (!value) return 0;
  const match = ISO_DURATION.exec(value);
  if (!match) return 0;

  const [, hours, minutes, seconds] = match;
  return (
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0)
  );
}
