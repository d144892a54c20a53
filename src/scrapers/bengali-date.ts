const BENGALI_DIGITS = '০১২৩৪৫৬৭৮৯';

// Bangladesh Standard Time; the sites print local times without an offset.
export const DHAKA_OFFSET = '+06:00';

const MONTHS: Record<string, number> = {
    'জানুয়ারি': 1,
    'ফেব্রুয়ারি': 2,
    'মার্চ': 3,
    'এপ্রিল': 4,
    'মে': 5,
    'জুন': 6,
    'জুলাই': 7,
    'আগস্ট': 8,
    'সেপ্টেম্বর': 9,
    'অক্টোবর': 10,
    'নভেম্বর': 11,
    'ডিসেম্বর': 12,
};

// Keyed by NFC form: "য়" appears both precomposed and as য + nukta.
const BENGALI_MONTHS = new Map(
    Object.entries(MONTHS).map(([name, month]) => [name.normalize('NFC'), month] as const),
);

export function toAsciiDigits(text: string): string {
    return text.replace(/[০-৯]/g, (digit) => String(BENGALI_DIGITS.indexOf(digit)));
}

export function bengaliMonth(name: string): number | null {
    return BENGALI_MONTHS.get(name.normalize('NFC')) ?? null;
}

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * Reads dates such as "১৩ সেপ্টেম্বর ২০২৫, ২৩:১১" (time optional) and
 * returns an ISO-8601 string with the Dhaka offset, or null.
 */
export function parseBengaliDate(text: string): string | null {
    const normalized = toAsciiDigits(text.normalize('NFC'));
    const match = /(\d{1,2})\s+([^\s\d,]+)\s*,?\s+(\d{4})(?:\s*,?\s*(\d{1,2}):(\d{2}))?/u.exec(normalized);
    if (!match) return null;

    const [, dayText, monthName, yearText, hourText, minuteText] = match;
    const month = bengaliMonth(monthName);
    if (month === null) return null;

    const day = Number(dayText);
    const year = Number(yearText);
    const hour = hourText === undefined ? 0 : Number(hourText);
    const minute = minuteText === undefined ? 0 : Number(minuteText);
    if (day < 1 || day > daysInMonth(year, month) || hour > 23 || minute > 59) return null;

    const iso = `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:00${DHAKA_OFFSET}`;
    return Number.isNaN(Date.parse(iso)) ? null : iso;
}
