/**
 * Input-name discovery handshake.
 * @module avr/discovery
 */
import type {Logger} from '../../core/logger';
import {delay} from '../../core/utils';
import {
    AVR_DEFAULT_COMMAND_DELAY_MS,
    AVR_DEFAULT_DISCOVERY_POLL_MS,
    AVR_DEFAULT_DISCOVERY_TIMEOUT_MS,
    AVR_INPUT_COUNT,
} from './constants';
import {inputNameQuery} from './commands';

export type InputDiscoveryOptions = {
    /** Number of input slots to query, starting at 1. */
    inputCount?: number;
    /** Pause after each `ISN<n>?` query. */
    commandDelayMs?: number;
    /** Interval at which pending answers are checked. */
    pollIntervalMs?: number;
    /** Upper bound on waiting for answers once all queries are sent. */
    timeoutMs?: number;
    logger?: Logger;
};

export type InputDiscoveryResult = {
    /** Inputs that answered, ascending. */
    discovered: number[];
    /** Inputs that never answered, ascending. */
    missing: number[];
    /** `true` when every input answered. */
    complete: boolean;
    /** Queries actually written; 0 when the connection was already gone. */
    queried: number;
    elapsedMs: number;
};

/**
 * Queries the display name of every input slot and waits, bounded, for the answers.
 *
 * Answers arrive through the read loop, which calls {@link acknowledge};
 * the handshake itself only sends and polls.
 */
export class InputNameDiscovery {
    private readonly pending = new Set<number>();
    private readonly inputCount: number;
    private readonly commandDelayMs: number;
    private readonly pollIntervalMs: number;
    private readonly timeoutMs: number;
    private readonly logger?: Logger;

    constructor(options: InputDiscoveryOptions = {}) {
        this.inputCount = options.inputCount ?? AVR_INPUT_COUNT;
        this.commandDelayMs = options.commandDelayMs ?? AVR_DEFAULT_COMMAND_DELAY_MS;
        this.pollIntervalMs = options.pollIntervalMs ?? AVR_DEFAULT_DISCOVERY_POLL_MS;
        this.timeoutMs = options.timeoutMs ?? AVR_DEFAULT_DISCOVERY_TIMEOUT_MS;
        this.logger = options.logger;
    }

    /** Inputs still awaiting an answer, ascending. */
    public get pendingInputs(): number[] {
        return Array.from(this.pending).sort((a, b) => a - b);
    }

    /**
     * Record an answer for `input`.
     * @returns `true` if the input was pending.
     */
    public acknowledge(input: number): boolean {
        return this.pending.delete(input);
    }

    /**
     * Run one handshake.
     * Stops sending as soon as `send` reports failure; never throws.
     */
    public async run(send: (command: string) => Promise<boolean>): Promise<InputDiscoveryResult> {
        const startedAt = Date.now();
        this.pending.clear();
        for (let input = 1; input <= this.inputCount; input += 1) {
            this.pending.add(input);
        }

        let sendFailed = false;
        let queried = 0;
        for (let input = 1; input <= this.inputCount; input += 1) {
            if (!(await send(inputNameQuery(input)))) {
                sendFailed = true;
                break;
            }
            queried += 1;
            await delay(this.commandDelayMs);
        }

        if (!sendFailed) {
            const deadline = Date.now() + this.timeoutMs;
            while (this.pending.size > 0 && Date.now() < deadline) {
                await delay(this.pollIntervalMs);
            }
        }

        const missing = this.pendingInputs;
        this.pending.clear();
        const discovered: number[] = [];
        for (let input = 1; input <= this.inputCount; input += 1) {
            if (!missing.includes(input)) discovered.push(input);
        }

        if (missing.length > 0) {
            this.logger?.warn('Input name discovery incomplete', {missing});
        } else {
            this.logger?.info('Input name discovery completed', {inputs: discovered.length});
        }

        return {
            discovered,
            missing,
            complete: missing.length === 0,
            queried,
            elapsedMs: Date.now() - startedAt,
        };
    }
}
