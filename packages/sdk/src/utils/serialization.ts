import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    let stringified: string;
    try {
        stringified = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(`Failed to serialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }

    const size = Buffer.byteLength(stringified);
    if (size > MAX_PAYLOAD_SIZE) {
        throw new SerializationError(
            `Payload size exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`
        );
    }

    return stringified;
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Converts a payload into the JSON document stored in a jsonb column.
 * The superjson envelope keeps Dates and Maps intact across a round trip.
 */
export function toColumn(value: unknown): string | null {
    const text = serialize(value);
    return text === '' ? null : text;
}

/** Reads back a jsonb column written by {@link toColumn}; pg hands jsonb over already parsed. */
export function fromColumn<T>(column: unknown): T | undefined {
    if (column === null || column === undefined) return undefined;
    return deserialize<T>(typeof column === 'string' ? column : JSON.stringify(column));
}
