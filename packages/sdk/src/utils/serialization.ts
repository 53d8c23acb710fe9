import superjson from 'superjson';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

function formatMegabytes(bytes: number): string {
    return `${(bytes / 1024 / 1024).toFixed(2)}MB`;
}

export function serialize(value: unknown, maxBytes: number = MAX_PAYLOAD_SIZE): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);
        const size = Buffer.byteLength(stringified);

        if (size > maxBytes) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of ${formatMegabytes(maxBytes)}. Current size: ${formatMegabytes(size)}`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}
