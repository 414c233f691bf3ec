/**
 * Receiver TCP client: connection lifecycle, read loop, commands and cached state.
 * @module avr/client
 */
import * as net from 'net';
import type {Socket} from 'net';
import {EventEmitter} from 'events';

import {parseDeviceConfig, type DeviceConfig, type DeviceConfigInput} from '../../config/device';
import {createLogger, type Logger} from '../../core/logger';
import {
    StateCache,
    type DeviceInfo,
    type DeviceInfoKey,
    type StateSnapshot,
    type ZoneState,
    type ZoneStateKey,
} from '../../core/StateCache';
import {delay, isPositiveInteger} from '../../core/utils';
import {Zone} from '../../core/Zone';
import {
    AVR_COMMAND_TERMINATOR,
    AVR_DEFAULT_COMMAND_DELAY_MS,
    AVR_DEFAULT_DISCOVERY_POLL_MS,
    AVR_DEFAULT_DISCOVERY_TIMEOUT_MS,
    AVR_DEFAULT_LIVENESS_TIMEOUT_MS,
    AVR_DEFAULT_MAX_LINE_BYTES,
    AVR_DEFAULT_STARTUP_DELAY_MS,
    AVR_DEFAULT_STATUS_QUERY_DELAY_MS,
    AVR_INPUT_COUNT,
    ConnectionState,
    ECHO_OFF_COMMAND,
} from './constants';
import {
    deviceInfoQueries,
    inputCommand,
    inputQuery,
    modelQuery,
    muteCommand,
    muteQuery,
    powerCommand,
    powerQuery,
    volumeCommand,
    volumeDownCommand,
    volumeQuery,
    volumeUpCommand,
    zoneStatusQueries,
} from './commands';
import {InputNameDiscovery, type InputDiscoveryResult} from './discovery';
import {AvrError, isTransientConnectError, toAvrError} from './errors';
import {LineFramer} from './framer';
import {AvrNotificationType, parseLine, type AvrNotification} from './parser';

/**
 * Tuning for an {@link AvrClient}. Connection identity and retry policy live
 * in {@link DeviceConfig}; everything here has a protocol-appropriate default.
 */
export type AvrClientOptions = {
    /** Defaults to a `createLogger('avr', config.name)` instance. */
    logger?: Logger;
    /** Read inactivity after which a debug line is logged. The connection is kept. */
    livenessTimeoutMs?: number;
    /** Pause after the read loop starts, before the startup commands. */
    startupDelayMs?: number;
    /** Pause between paced commands (echo suppression, discovery queries). */
    commandDelayMs?: number;
    /** Pause between the four queries of {@link AvrClient.queryAllStatus}. */
    statusQueryDelayMs?: number;
    /** Bound on waiting for input-name answers. */
    discoveryTimeoutMs?: number;
    discoveryPollMs?: number;
    /** Number of input slots queried during discovery. */
    inputCount?: number;
    /** Largest unterminated line kept before the stream is treated as corrupt. */
    maxLineBytes?: number;
};

/**
 * Typed event map emitted by {@link AvrClient}.
 */
export interface AvrClientEvents {
    /** Connection state transitions. */
    state: [state: ConnectionState];
    /** Emitted once the socket is open, before the startup handshake. */
    connect: [];
    /** `error` is `null` for a requested disconnect. */
    disconnect: [error: AvrError | null];
    /** Every framed, non-empty line. */
    line: [line: string];
    /** Every line that parsed to a known notification and updated the cache. */
    notification: [notification: AvrNotification, line: string];
    inputsDiscovered: [result: InputDiscoveryResult];
    /** Only emitted while a listener is attached. */
    error: [error: AvrError];
}

/** Single-slot observer for recognised notification lines. */
export type UpdateCallback = (line: string) => void;

type ReadLoop = {
    /** Resolves when the loop has stopped; never rejects. */
    done: Promise<void>;
    cancel: () => void;
};

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Stateful client for one receiver.
 *
 * Commands resolve `true` once written and never wait for the receiver's
 * answer; the answer arrives as a notification, updates the cache, and is
 * passed to the update callback. No method rejects: failures are logged and
 * reported as `false` or as absent cached values.
 */
export class AvrClient extends EventEmitter<AvrClientEvents> {
    private readonly config: DeviceConfig;
    private readonly log: Logger;
    private readonly cache = new StateCache();
    private readonly discovery: InputNameDiscovery;
    private readonly livenessTimeoutMs: number;
    private readonly startupDelayMs: number;
    private readonly commandDelayMs: number;
    private readonly statusQueryDelayMs: number;
    private readonly maxLineBytes: number;

    private socket: Socket | null = null;
    private readLoop: ReadLoop | null = null;
    private state: ConnectionState = ConnectionState.Disconnected;
    private lifecycle: Promise<unknown> = Promise.resolve();
    private updateCallback: UpdateCallback | null = null;
    private inputNamesDiscovered = false;

    /**
     * @param config Raw or parsed configuration; validated here.
     */
    constructor(config: DeviceConfigInput, options: AvrClientOptions = {}) {
        super();
        this.config = parseDeviceConfig(config);
        this.log = options.logger ?? createLogger('avr', this.config.name);
        this.livenessTimeoutMs = options.livenessTimeoutMs ?? AVR_DEFAULT_LIVENESS_TIMEOUT_MS;
        this.startupDelayMs = options.startupDelayMs ?? AVR_DEFAULT_STARTUP_DELAY_MS;
        this.commandDelayMs = options.commandDelayMs ?? AVR_DEFAULT_COMMAND_DELAY_MS;
        this.statusQueryDelayMs = options.statusQueryDelayMs ?? AVR_DEFAULT_STATUS_QUERY_DELAY_MS;
        this.maxLineBytes = options.maxLineBytes ?? AVR_DEFAULT_MAX_LINE_BYTES;
        this.discovery = new InputNameDiscovery({
            inputCount: options.inputCount ?? AVR_INPUT_COUNT,
            commandDelayMs: this.commandDelayMs,
            pollIntervalMs: options.discoveryPollMs ?? AVR_DEFAULT_DISCOVERY_POLL_MS,
            timeoutMs: options.discoveryTimeoutMs ?? AVR_DEFAULT_DISCOVERY_TIMEOUT_MS,
            logger: this.log,
        });
    }

    /**
     * Open the connection, retrying transient failures.
     *
     * Resolves `true` immediately when already connected. After the socket
     * opens, echo is switched off, input names are discovered and zone 1
     * power is queried; those steps are best-effort and do not affect the result.
     */
    public connect(
        maxRetries = this.config.maxRetries,
        retryDelayMs = this.config.retryDelayMs,
    ): Promise<boolean> {
        return this.exclusive(() => this.connectWithRetry(maxRetries, retryDelayMs));
    }

    /** Stop the read loop and close the socket. No-op when not connected. */
    public disconnect(): Promise<void> {
        return this.exclusive(async () => {
            if (this.state !== ConnectionState.Connected) return;

            this.log.info(`Disconnecting from ${this.config.name}`);
            const {socket, readLoop} = this;
            this.socket = null;
            this.readLoop = null;

            if (readLoop) {
                readLoop.cancel();
                await readLoop.done;
            }
            if (socket) this.closeSocket(socket);

            this.setState(ConnectionState.Disconnected);
            this.emit('disconnect', null);
            this.log.info(`Disconnected from ${this.config.name}`);
        });
    }

    public close(): Promise<void> {
        return this.disconnect();
    }

    /**
     * Write one command followed by CR.
     * A write failure marks the client disconnected and resolves `false`.
     */
    public async sendCommand(command: string): Promise<boolean> {
        const socket = this.socket;
        if (this.state !== ConnectionState.Connected || !socket) {
            const error = new AvrError({
                message: `Cannot send command ${command}: not connected`,
                domain: 'transport',
                code: 'NOT_CONNECTED',
                details: {command},
            });
            this.log.warn(error.message, {code: error.code});
            this.reportError(error);
            return false;
        }

        try {
            await new Promise<void>((resolve, reject) => {
                socket.write(Buffer.from(`${command}${AVR_COMMAND_TERMINATOR}`, 'ascii'), (err) => {
                    if (err) reject(err);
                    else resolve();
                });
            });
            this.log.debug(`Sent command: ${command}`);
            return true;
        } catch (err) {
            const error = toAvrError(err, 'transport', 'WRITE_FAILED', {command});
            this.log.error(`Error sending command ${command}`, {message: error.message});
            if (this.socket === socket) this.markDisconnected(error);
            return false;
        }
    }

    /** Replace the update callback; `null` clears it. */
    public setUpdateCallback(callback: UpdateCallback | null): void {
        this.updateCallback = callback;
    }

    /**
     * Re-run the input-name handshake on the current connection.
     * Also runs automatically on every successful connect.
     */
    public async discoverInputNames(): Promise<InputDiscoveryResult> {
        this.log.info(`Discovering input names for ${this.config.name}`);
        const result = await this.discovery.run((command) => this.sendCommand(command));
        if (result.queried === 0) return result;

        this.inputNamesDiscovered = true;
        if (!result.complete) {
            this.reportError(new AvrError({
                message: `No name reported for inputs ${result.missing.join(', ')}`,
                domain: 'timeout',
                code: 'DISCOVERY_INCOMPLETE',
                details: {missing: result.missing},
            }));
        }
        this.emit('inputsDiscovered', result);
        return result;
    }

    public powerOn(zone = 1): Promise<boolean> {
        return this.issue(() => powerCommand(zone, true));
    }

    public powerOff(zone = 1): Promise<boolean> {
        return this.issue(() => powerCommand(zone, false));
    }

    /** Set an absolute level in dB; clamped to [-90, 0]. */
    public setVolume(db: number, zone = 1): Promise<boolean> {
        return this.issue(() => volumeCommand(zone, db));
    }

    public volumeUp(zone = 1): Promise<boolean> {
        return this.issue(() => volumeUpCommand(zone));
    }

    public volumeDown(zone = 1): Promise<boolean> {
        return this.issue(() => volumeDownCommand(zone));
    }

    public setMute(muted: boolean, zone = 1): Promise<boolean> {
        return this.issue(() => muteCommand(zone, muted));
    }

    public selectInput(input: number, zone = 1): Promise<boolean> {
        return this.issue(() => inputCommand(zone, input));
    }

    /** Select an input by its discovered display name. */
    public async selectInputByName(name: string, zone = 1): Promise<boolean> {
        const input = this.cache.findInputByName(name);
        if (input === undefined) {
            this.log.warn(`Unknown input name "${name}"`, {known: this.cache.getInputList()});
            return false;
        }
        return this.selectInput(input, zone);
    }

    public queryPower(zone = 1): Promise<boolean> {
        return this.issue(() => powerQuery(zone));
    }

    public queryVolume(zone = 1): Promise<boolean> {
        return this.issue(() => volumeQuery(zone));
    }

    public queryMute(zone = 1): Promise<boolean> {
        return this.issue(() => muteQuery(zone));
    }

    public queryInput(zone = 1): Promise<boolean> {
        return this.issue(() => inputQuery(zone));
    }

    public queryModel(): Promise<boolean> {
        return this.issue(() => modelQuery());
    }

    /** Query model, name, region and software version. */
    public queryDeviceInfo(): Promise<boolean> {
        return this.sendPaced(deviceInfoQueries(), this.commandDelayMs);
    }

    /**
     * Query power, volume, mute and input of one zone, pausing between
     * queries. Resolves `true` only if all four were written.
     */
    public queryAllStatus(zone = 1): Promise<boolean> {
        if (!isPositiveInteger(zone)) {
            this.log.warn(`Rejected status query for zone ${zone}`);
            return Promise.resolve(false);
        }
        return this.sendPaced(zoneStatusQueries(zone), this.statusQueryDelayMs);
    }

    /** Handle for one zone. Throws `RangeError` for a non-positive zone number. */
    public zone(zone: number): Zone {
        if (!isPositiveInteger(zone)) {
            throw new RangeError(`Zone must be a positive integer, got ${zone}`);
        }
        const configured = this.config.zones.find((entry) => entry.zone === zone);
        return new Zone(this, zone, configured?.name);
    }

    /** Handles for the enabled zones of the configuration. */
    public zones(): Zone[] {
        return this.config.zones
            .filter((entry) => entry.enabled)
            .map((entry) => new Zone(this, entry.zone, entry.name));
    }

    public getZoneState(zone: number): Readonly<ZoneState> {
        return this.cache.getZoneState(zone);
    }

    public getZoneValue<K extends ZoneStateKey>(zone: number, key: K): ZoneState[K] {
        return this.cache.getZoneValue(zone, key);
    }

    public getCachedState<K extends DeviceInfoKey>(key: K): DeviceInfo[K] {
        return this.cache.getDeviceValue(key);
    }

    public getDeviceInfo(): Readonly<DeviceInfo> {
        return this.cache.getDeviceInfo();
    }

    public getStateSnapshot(): StateSnapshot {
        return this.cache.snapshot();
    }

    public getInputNames(): ReadonlyMap<number, string> {
        return this.cache.getInputNames();
    }

    /** Discovered name of `input`, or `Input <n>` when unknown. */
    public getInputName(input: number): string {
        return this.cache.getInputName(input);
    }

    public getInputNumberByName(name: string): number | undefined {
        return this.cache.findInputByName(name);
    }

    /** Discovered input names ordered by input number. */
    public getInputList(): string[] {
        return this.cache.getInputList();
    }

    /** `true` once a discovery handshake has written its queries on any connection. */
    public hasDiscoveredInputNames(): boolean {
        return this.inputNamesDiscovered;
    }

    public isConnected(): boolean {
        return this.state === ConnectionState.Connected;
    }

    public getConnectionState(): ConnectionState {
        return this.state;
    }

    public getDeviceConfig(): DeviceConfig {
        return this.config;
    }

    public getDeviceName(): string {
        return this.config.name;
    }

    public getDeviceHost(): string {
        return this.config.host;
    }

    public getIdentifier(): string {
        return this.config.identifier;
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.lifecycle.then(task);
        this.lifecycle = run.catch(() => undefined);
        return run;
    }

    private async connectWithRetry(maxRetries: number, retryDelayMs: number): Promise<boolean> {
        if (this.state === ConnectionState.Connected) return true;
        this.releaseTransport();

        const attempts = Math.max(1, Math.floor(maxRetries));
        const {name, host, port} = this.config;

        for (let attempt = 1; attempt <= attempts; attempt += 1) {
            this.setState(ConnectionState.Connecting);
            this.log.info(`Connecting to ${name} at ${host}:${port} (attempt ${attempt}/${attempts})`);
            try {
                const socket = await this.openSocket();
                this.attach(socket);
                await this.runStartup();
                return true;
            } catch (err) {
                const error = toAvrError(err, 'transport', 'CONNECT_FAILED', {attempt});
                const context = {attempt, code: error.systemCode ?? error.code, message: error.message};
                if (isTransientConnectError(error)) {
                    this.log.error(`Network error connecting to ${name}`, context);
                } else {
                    this.log.error(`Unexpected connection error to ${name}`, context);
                }
                this.releaseTransport();
                this.setState(ConnectionState.Disconnected);
                if (attempt < attempts) await delay(retryDelayMs);
            }
        }

        this.log.error(`Giving up on ${name} after ${attempts} attempts`);
        return false;
    }

    private openSocket(): Promise<Socket> {
        const {host, port, connectTimeoutMs} = this.config;
        return new Promise<Socket>((resolve, reject) => {
            const socket = net.createConnection({host, port});

            const cleanup = (): void => {
                clearTimeout(timer);
                socket.removeListener('connect', onConnect);
                socket.removeListener('error', onError);
            };
            const abandon = (error: AvrError): void => {
                cleanup();
                socket.on('error', (late) => this.log.debug('Error on abandoned socket', {message: late.message}));
                socket.destroy();
                reject(error);
            };
            const onConnect = (): void => {
                cleanup();
                resolve(socket);
            };
            const onError = (err: Error): void => {
                abandon(toAvrError(err, 'transport', 'CONNECT_FAILED', {host, port}));
            };
            const timer = setTimeout(() => {
                abandon(new AvrError({
                    message: `Connection to ${host}:${port} timed out after ${connectTimeoutMs}ms`,
                    domain: 'timeout',
                    code: 'CONNECT_TIMEOUT',
                    details: {host, port},
                }));
            }, connectTimeoutMs);

            socket.once('connect', onConnect);
            socket.once('error', onError);
        });
    }

    private attach(socket: Socket): void {
        this.socket = socket;
        // Errors after the read loop stopped must not surface as unhandled events.
        socket.on('error', (err) => this.log.debug('Socket error', {message: err.message}));
        this.setState(ConnectionState.Connected);
        this.log.info(`Connected to ${this.config.name}`);
        this.readLoop = this.startReadLoop(socket);
        this.emit('connect');
    }

    private async runStartup(): Promise<void> {
        await delay(this.startupDelayMs);
        await this.startupStep('echo suppression', async () => {
            await this.sendCommand(ECHO_OFF_COMMAND);
            await delay(this.commandDelayMs);
        });
        await this.startupStep('input discovery', () => this.discoverInputNames());
        await this.startupStep('initial power query', () => this.sendCommand(powerQuery(1)));
    }

    private async startupStep(label: string, step: () => Promise<unknown>): Promise<void> {
        try {
            await step();
        } catch (err) {
            this.log.error(`Startup step "${label}" failed`, {message: describeError(err)});
        }
    }

    private startReadLoop(socket: Socket): ReadLoop {
        const framer = new LineFramer(this.maxLineBytes);
        let active = true;
        let finish: () => void = () => undefined;
        const done = new Promise<void>((resolve) => {
            finish = resolve;
        });

        const stop = (): void => {
            if (!active) return;
            active = false;
            socket.setTimeout(0);
            socket.removeListener('data', onData);
            socket.removeListener('timeout', onTimeout);
            socket.removeListener('end', onEnd);
            socket.removeListener('close', onClose);
            socket.removeListener('error', onError);
            framer.reset();
            this.log.info(`Read loop ended for ${this.config.name}`);
            finish();
        };
        const fail = (error: AvrError): void => {
            if (!active) return;
            stop();
            if (this.socket === socket) this.markDisconnected(error);
        };
        const onData = (chunk: Buffer): void => {
            let lines: string[];
            try {
                lines = framer.push(chunk);
            } catch (err) {
                fail(toAvrError(err, 'protocol', 'STREAM_FRAMING_ERROR'));
                return;
            }
            for (const line of lines) {
                if (!active) return;
                this.dispatchLine(line);
            }
        };
        const onTimeout = (): void => {
            this.log.debug(`No data from ${this.config.name} for ${this.livenessTimeoutMs}ms`);
        };
        const onEnd = (): void => {
            fail(new AvrError({
                message: `Connection closed by ${this.config.name}`,
                domain: 'transport',
                code: 'PEER_CLOSED',
            }));
        };
        const onClose = (): void => onEnd();
        const onError = (err: Error): void => {
            fail(toAvrError(err, 'transport', 'TRANSPORT_ERROR'));
        };

        socket.setTimeout(this.livenessTimeoutMs);
        socket.on('data', onData);
        socket.on('timeout', onTimeout);
        socket.on('end', onEnd);
        socket.on('close', onClose);
        socket.on('error', onError);

        return {done, cancel: stop};
    }

    private dispatchLine(line: string): void {
        this.log.debug(`Received: ${line}`);
        this.emitToListeners('line', line, () => this.emit('line', line));

        const notification = parseLine(line);
        if (!this.cache.apply(notification)) return;

        if (notification.type === AvrNotificationType.InputName) {
            this.discovery.acknowledge(notification.input);
            this.log.debug(`Discovered input ${notification.input}: ${notification.name}`);
        }
        this.notifyObserver(line);
        this.emitToListeners('notification', line, () => this.emit('notification', notification, line));
    }

    /** Listener exceptions are logged; they never reach the read loop. */
    private emitToListeners(event: string, line: string, emit: () => void): void {
        try {
            emit();
        } catch (err) {
            this.log.error(`Error in ${event} listener`, {message: describeError(err), line});
        }
    }

    private notifyObserver(line: string): void {
        const callback = this.updateCallback;
        if (!callback) return;
        try {
            callback(line);
        } catch (err) {
            this.log.error('Error in update callback', {message: describeError(err), line});
        }
    }

    /** Downgrade to disconnected without the full disconnect sequence. */
    private markDisconnected(error: AvrError): void {
        if (this.state === ConnectionState.Disconnected) return;
        this.log.warn(`Lost connection to ${this.config.name}`, {code: error.code, message: error.message});
        this.releaseTransport();
        this.setState(ConnectionState.Disconnected);
        this.reportError(error);
        this.emit('disconnect', error);
    }

    private releaseTransport(): void {
        const {socket, readLoop} = this;
        this.socket = null;
        this.readLoop = null;
        readLoop?.cancel();
        if (socket) this.closeSocket(socket);
    }

    private closeSocket(socket: Socket): void {
        try {
            socket.end();
            socket.destroy();
        } catch (err) {
            this.log.debug('Error closing socket', {message: describeError(err)});
        }
    }

    private async issue(build: () => string): Promise<boolean> {
        let command: string;
        try {
            command = build();
        } catch (err) {
            const error = toAvrError(err, 'command', 'INVALID_ARGUMENT');
            this.log.warn('Rejected command', {code: error.code, message: error.message});
            this.reportError(error);
            return false;
        }
        return this.sendCommand(command);
    }

    private async sendPaced(commands: string[], pauseMs: number): Promise<boolean> {
        let allSent = true;
        for (const [index, command] of commands.entries()) {
            if (index > 0) await delay(pauseMs);
            allSent = (await this.sendCommand(command)) && allSent;
        }
        return allSent;
    }

    private setState(next: ConnectionState): void {
        if (next === this.state) return;
        this.state = next;
        this.emit('state', next);
    }

    private reportError(error: AvrError): void {
        if (this.listenerCount('error') > 0) this.emit('error', error);
    }
}
