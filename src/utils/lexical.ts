/**
 * Lexical forms of the xsd datatypes cells are checked against or typed as.
 */

export const INTEGER = /^[+-]?\d+$/;
export const NON_NEGATIVE_INTEGER = /^\+?\d+$/;
/** xsd:decimal has no exponent */
export const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;
export const DOUBLE = /^[+-]?(\d+\.?\d*|\.\d+)[eE][+-]?\d+$/;

const DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2}):(\d{2}))?$/;

function isCalendarDay(year: number, month: number, day: number): boolean {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * `YYYY-MM-DD` naming a day that exists ("2024-02-30" does not).
 */
export function isIsoDate(value: string): boolean {
    const match = DATE.exec(value);
    if (!match) return false;
    return isCalendarDay(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * `YYYY-MM-DDThh:mm[:ss[.fff]][Z|±hh:mm]` with a real day and clock time.
 */
export function isIsoDateTime(value: string): boolean {
    const match = DATE_TIME.exec(value);
    if (!match) return false;

    const [, year, month, day, hour, minute, second = '0', offsetHour = '0', offsetMinute = '0'] = match;
    return (
        isCalendarDay(Number(year), Number(month), Number(day)) &&
        Number(hour) < 24 &&
        Number(minute) < 60 &&
        Number(second) < 60 &&
        Number(offsetHour) < 24 &&
        Number(offsetMinute) < 60
    );
}
