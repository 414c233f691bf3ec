/**
 * CR/LF line framing for the receiver TCP stream.
 * @module avr/framer
 */
import {AVR_DEFAULT_MAX_LINE_BYTES} from './constants';
import {AvrError} from './errors';

const TERMINATOR = /[\r\n]/;

/**
 * Decode a chunk as ASCII, dropping bytes outside the 7-bit range
 * instead of failing the whole read.
 */
export const decodeAscii = (chunk: Buffer | Uint8Array): string =>
    Buffer.from(chunk.filter((byte) => byte < 0x80)).toString('ascii');

/**
 * Extract every complete line from a text buffer.
 * Lines are split at the earliest CR or LF, trimmed, and empty lines dropped.
 * Returns the lines in order and the unterminated tail.
 */
export const extractLines = (buffer: string): {lines: string[]; remainder: string} => {
    const lines: string[] = [];
    let rest = buffer;
    let match = TERMINATOR.exec(rest);

    while (match) {
        const line = rest.slice(0, match.index).trim();
        rest = rest.slice(match.index + 1);
        if (line) lines.push(line);
        match = TERMINATOR.exec(rest);
    }

    return {lines, remainder: rest};
};

/** Stateful framer that accumulates partial reads between chunks. */
export class LineFramer {
    private buffer = '';

    /**
     * @param maxLineBytes Largest unterminated tail kept before the stream is
     * considered corrupt.
     */
    constructor(private readonly maxLineBytes = AVR_DEFAULT_MAX_LINE_BYTES) {}

    /**
     * Append one chunk and return the lines it completed.
     * Throws `AvrError(STREAM_FRAMING_ERROR)` when the tail outgrows `maxLineBytes`.
     */
    public push(chunk: Buffer | Uint8Array | string): string[] {
        const text = typeof chunk === 'string' ? chunk : decodeAscii(chunk);
        const {lines, remainder} = extractLines(this.buffer + text);
        if (remainder.length > this.maxLineBytes) {
            this.buffer = '';
            throw new AvrError({
                message: `Unterminated line exceeded ${this.maxLineBytes} bytes`,
                domain: 'protocol',
                code: 'STREAM_FRAMING_ERROR',
                details: {pendingBytes: remainder.length},
            });
        }
        this.buffer = remainder;
        return lines;
    }

    /** Bytes waiting for a terminator. */
    public get pending(): string {
        return this.buffer;
    }

    public reset(): void {
        this.buffer = '';
    }
}
