import { ZodError, ZodTypeAny } from 'zod';
import { MissingInformationError } from './errors';

export const REQUIRED_OPTIONS = {
    base: ['consignorId', 'consignorKey'],
    order: ['shippingProductId', 'recipient'],
    track: ['shipmentId'],
    address: ['street1', 'cityName'],
    parcel: ['weight', 'length', 'height', 'width'],
    commodity: ['name', 'quantity'],
} as const satisfies Record<string, readonly string[]>;

export type OptionSetName = keyof typeof REQUIRED_OPTIONS;

/**
 * Throws a MissingInformationError naming every required key of the option set
 * that is absent (`undefined` or `null`), in the order the table declares them.
 */
export function checkRequiredOptions(kind: OptionSetName, options: object | null | undefined): void {
    const present = new Map<string, unknown>(Object.entries(options ?? {}));
    const required: readonly string[] = REQUIRED_OPTIONS[kind];
    const missing = required.filter(key => {
        const value = present.get(key);
        return value === undefined || value === null;
    });
    if (missing.length > 0) {
        throw new MissingInformationError(
            `You have not entered ${missing.join(', ')}`,
            { missing },
        );
    }
}

/**
 * Required-key check followed by a type check of the whole option set.
 * Input is never modified.
 */
export function validateOptions(kind: OptionSetName | null, schema: ZodTypeAny, options: unknown): void {
    if (kind) {
        checkRequiredOptions(kind, typeof options === 'object' ? options : undefined);
    }
    try {
        schema.parse(options);
    } catch (err) {
        if (err instanceof ZodError) {
            throw toMissingInformationError(err, kind ?? 'options');
        }
        throw err;
    }
}

export function toMissingInformationError(err: ZodError, label: string): MissingInformationError {
    const issues = err.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
    }));
    const summary = issues
        .map(issue => (issue.field ? `${issue.field}: ${issue.message}` : issue.message))
        .join('; ');
    return new MissingInformationError(
        `Invalid ${label}: ${summary}`,
        { details: { issues } },
    );
}
