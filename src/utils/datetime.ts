import { DateTime } from 'luxon';

const SOURCE_ZONE = 'Europe/Amsterdam';
const TIME_COMPONENT = /\d{1,2}:\d{2}/;

const FORMAT_CANDIDATES = [
  'd LLLL yyyy',
  'd LLL yyyy',
  'd LLLL yyyy HH:mm',
  'dd-MM-yyyy',
  'd-M-yyyy',
  'dd/MM/yyyy',
  'd/M/yyyy',
  'dd.MM.yyyy',
  'dd-MM-yyyy HH:mm',
  'd-M-yyyy HH:mm'
];

function formatParsed(parsed: DateTime, hasTime: boolean): string | undefined {
  if (hasTime) return parsed.toISO({ suppressMilliseconds: true }) ?? undefined;
  return parsed.toISODate() ?? undefined;
}

/**
 * Normalizes a publication date found in markup.
 * Date-only values become `yyyy-MM-dd`; values with a time keep their offset as full ISO.
 * Returns undefined when nothing recognisable is found.
 */
export function normalizePublishedDate(rawValue: string): string | undefined {
  const normalizedText = rawValue
    .replace(/\s+/g, ' ')
    .replace(/^(ma|di|wo|do|vr|za|zo|maandag|dinsdag|woensdag|donderdag|vrijdag|zaterdag|zondag)\.?,?\s+/i, '')
    .replace(/\s+om\s+/i, ' ')
    .replace(/\s*uur$/i, '')
    .trim();
  if (!normalizedText) return undefined;

  const hasTime = TIME_COMPONENT.test(normalizedText);

  const isoCandidate = DateTime.fromISO(normalizedText, { setZone: true, zone: SOURCE_ZONE });
  if (isoCandidate.isValid) return formatParsed(isoCandidate, hasTime);

  for (const format of FORMAT_CANDIDATES) {
    for (const locale of ['nl', 'en']) {
      const candidate = DateTime.fromFormat(normalizedText, format, { zone: SOURCE_ZONE, locale });
      if (candidate.isValid) return formatParsed(candidate, format.includes('HH'));
    }
  }

  return undefined;
}
