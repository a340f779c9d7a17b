/**
 * A calendar day with no time of day attached.
 *
 * `localize` looks up its formats under `date.formats`, while a JS `Date`
 * (which always carries an hour) uses `time.formats`.
 *
 * @example
 * ```ts
 * i18n.localize(new CalendarDate(1970, 1, 1), { format: 'day' }); // => 'jeudi'
 * ```
 */
export class CalendarDate {
    readonly year: number;
    /** 1-12 */
    readonly month: number;
    readonly day: number;

    constructor(year: number, month: number, day: number) {
        this.year = year;
        this.month = month;
        this.day = day;
    }

    /**
     * The calendar day of a `Date`, read in local time
     */
    static fromDate(date: Date): CalendarDate {
        return new CalendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
    }

    /** Day of the week, 0 = Sunday */
    get weekday(): number {
        return this.toUTCDate().getUTCDay();
    }

    /** False when a field is out of range, e.g. February 30th */
    isValid(): boolean {
        const utc = this.toUTCDate();
        return (
            !Number.isNaN(utc.getTime()) &&
            utc.getUTCFullYear() === this.year &&
            utc.getUTCMonth() === this.month - 1 &&
            utc.getUTCDate() === this.day
        );
    }

    /**
     * Midnight UTC of this day
     */
    toUTCDate(): Date {
        const date = new Date(Date.UTC(this.year, this.month - 1, this.day));
        // Date.UTC maps years 0-99 onto 1900-1999
        date.setUTCFullYear(this.year);
        return date;
    }

    toString(): string {
        const pad = (n: number) => String(n).padStart(2, '0');
        return `${String(this.year).padStart(4, '0')}-${pad(this.month)}-${pad(this.day)}`;
    }
}
