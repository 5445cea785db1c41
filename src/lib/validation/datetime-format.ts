/**
 * Datetime Format Matching
 *
 * Checks a string against a date format made of single-letter tokens:
 *
 *   Y  4-digit year        y  2-digit year (70-99 -> 19xx, else 20xx)
 *   m  month 01-12         n  month 1-12
 *   M  month Jan-Dec       F  month January-December
 *   d  day 01-31           j  day 1-31
 *   H  hour 00-23          G  hour 0-23
 *   h  hour 01-12          g  hour 1-12
 *   i  minutes 00-59       s  seconds 00-59
 *   A  AM or PM            a  am or pm
 *
 * `\` escapes the next character; any other non-letter is literal. A value
 * matches only in its canonical form for the format, and only when it names
 * a real calendar day ("2023-02-29" does not match "Y-m-d").
 */

type DatePart = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'meridiem';

interface FormatToken {
    pattern: string;
    part: DatePart;
    read(text: string): number | null;
}

interface CompiledFormat {
    pattern: RegExp;
    tokens: readonly FormatToken[];
}

const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December'
];

const SHORT_MONTH_NAMES = MONTH_NAMES.map(name => name.slice(0, 3));

function number(pattern: string, part: DatePart, min: number, max: number): FormatToken {
    return {
        pattern,
        part,
        read: text => {
            const value = Number(text);
            return value >= min && value <= max ? value : null;
        }
    };
}

function named(names: readonly string[]): FormatToken {
    return {
        pattern: names.join('|'),
        part: 'month',
        read: text => names.indexOf(text) + 1 || null
    };
}

const TOKENS: Readonly<Record<string, FormatToken>> = {
    Y: number('\\d{4}', 'year', 0, 9999),
    y: {
        pattern: '\\d{2}',
        part: 'year',
        read: text => {
            const value = Number(text);
            return value >= 70 ? 1900 + value : 2000 + value;
        }
    },
    m: number('\\d{2}', 'month', 1, 12),
    n: number('[1-9]\\d?', 'month', 1, 12),
    M: named(SHORT_MONTH_NAMES),
    F: named(MONTH_NAMES),
    d: number('\\d{2}', 'day', 1, 31),
    j: number('[1-9]\\d?', 'day', 1, 31),
    H: number('\\d{2}', 'hour', 0, 23),
    G: number('0|[1-9]\\d?', 'hour', 0, 23),
    h: number('\\d{2}', 'hour', 1, 12),
    g: number('[1-9]\\d?', 'hour', 1, 12),
    i: number('\\d{2}', 'minute', 0, 59),
    s: number('\\d{2}', 'second', 0, 59),
    A: { pattern: 'AM|PM', part: 'meridiem', read: text => (text === 'PM' ? 1 : 0) },
    a: { pattern: 'am|pm', part: 'meridiem', read: text => (text === 'pm' ? 1 : 0) },
};

/**
 * Compile a format into an anchored pattern; null for unsupported letters
 */
export function compileDateTimeFormat(format: string): CompiledFormat | null {
    const tokens: FormatToken[] = [];
    let source = '';

    for (let index = 0; index < format.length; index++) {
        let character = format[index];

        if (character === '\\' && index + 1 < format.length) {
            character = format[++index];
            source += escapeLiteral(character);
            continue;
        }

        const token = TOKENS[character];
        if (token !== undefined) {
            tokens.push(token);
            source += `(${token.pattern})`;
        } else if (/[A-Za-z]/.test(character)) {
            return null;
        } else {
            source += escapeLiteral(character);
        }
    }

    return { pattern: new RegExp(`^${source}$`), tokens };
}

export function matchDateTimeFormat(value: string, format: string): boolean {
    const compiled = compileDateTimeFormat(format);
    if (compiled === null) {
        return false;
    }

    const match = compiled.pattern.exec(value);
    if (match === null) {
        return false;
    }

    const parts = new Map<DatePart, number>();
    for (const [index, token] of compiled.tokens.entries()) {
        const read = token.read(match[index + 1]);
        if (read === null) {
            return false;
        }
        // The same part given twice must agree ("n/m" with "1/01")
        const previous = parts.get(token.part);
        if (previous !== undefined && previous !== read) {
            return false;
        }
        parts.set(token.part, read);
    }

    const day = parts.get('day');
    const month = parts.get('month');
    if (day !== undefined && month !== undefined) {
        const year = parts.get('year') ?? new Date().getFullYear();
        return day <= daysInMonth(year, month);
    }

    return true;
}

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
        return leap ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function escapeLiteral(character: string): string {
    return character.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
