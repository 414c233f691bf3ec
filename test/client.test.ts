import {EventEmitter} from 'events';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

type ConnectStep = 'connect' | 'hang' | {error: string};
type Responder = (command: string, socket: MockSocket) => void;

const INPUT_NAMES: Record<number, string> = {1: 'Blu-ray', 2: 'Game', 3: 'TV'};

/** Answers every `ISN<n>?` query; inputs without a name answer with an empty label. */
const answerInputNames: Responder = (command, socket) => {
    const match = /^ISN(\d+)\?$/.exec(command);
    if (!match) return;
    const input = Number(match[1]);
    socket.receive(`ISN${input}"${INPUT_NAMES[input] ?? ''}"\r\n`);
};

const sockets: MockSocket[] = [];
const plan: ConnectStep[] = [];
let responder: Responder | null = answerInputNames;

class MockSocket extends EventEmitter {
    public writes: string[] = [];
    public destroyed = false;
    public failWrites = false;
    public timeoutMs = 0;
    public respond: Responder | null = responder;

    public write(chunk: Buffer, cb?: (err?: Error | null) => void): boolean {
        if (this.failWrites) {
            cb?.(Object.assign(new Error('write EPIPE'), {code: 'EPIPE'}));
            return false;
        }
        const text = chunk.toString('ascii');
        this.writes.push(text);
        cb?.(null);
        const respond = this.respond;
        if (respond) queueMicrotask(() => respond(text.replace(/\r$/, ''), this));
        return true;
    }

    public setTimeout(ms: number): this {
        this.timeoutMs = ms;
        return this;
    }

    public end(): this {
        return this;
    }

    public destroy(): this {
        if (this.destroyed) return this;
        this.destroyed = true;
        this.emit('close', false);
        return this;
    }

    public receive(text: string): void {
        this.emit('data', Buffer.from(text, 'ascii'));
    }
}

vi.mock('net', () => ({
    createConnection: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        const step = plan.shift() ?? 'connect';
        queueMicrotask(() => {
            if (step === 'connect') {
                socket.emit('connect');
            } else if (step !== 'hang') {
                socket.emit('error', Object.assign(new Error(`connect ${step.error}`), {code: step.error}));
            }
        });
        return socket;
    }),
}));

import {AvrClient, AvrNotificationType, type AvrClientOptions, type DeviceConfigInput, type Logger} from '../src';

const createLoggerMock = (): Logger & {
    debug: ReturnType<typeof vi.fn>;
    info: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
} => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
});

let logger = createLoggerMock();

const createClient = (options: AvrClientOptions = {}, config: Partial<DeviceConfigInput> = {}): AvrClient =>
    new AvrClient(
        {name: 'Den', host: '10.0.0.5', retryDelayMs: 0, ...config},
        {
            logger,
            startupDelayMs: 0,
            commandDelayMs: 0,
            statusQueryDelayMs: 0,
            discoveryTimeoutMs: 20,
            discoveryPollMs: 5,
            ...options,
        },
    );

const lastSocket = (): MockSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('No socket was opened');
    return socket;
};

const connected = async (client: AvrClient): Promise<MockSocket> => {
    await expect(client.connect()).resolves.toBe(true);
    const socket = lastSocket();
    socket.writes.length = 0;
    return socket;
};

const STARTUP_WRITES = [
    'ECH0\r',
    ...Array.from({length: 15}, (_, index) => `ISN${index + 1}?\r`),
    'Z1POW?\r',
];

beforeEach(() => {
    sockets.length = 0;
    plan.length = 0;
    responder = answerInputNames;
    logger = createLoggerMock();
});

afterEach(() => {
    vi.useRealTimers();
});

describe('AvrClient connection lifecycle', () => {
    it('connects and runs the startup handshake', async () => {
        const client = createClient();
        const states: string[] = [];
        const discovered = vi.fn();
        client.on('state', (state) => states.push(state));
        client.on('inputsDiscovered', discovered);

        await expect(client.connect()).resolves.toBe(true);

        const socket = lastSocket();
        expect(sockets.length).toBe(1);
        expect(socket.writes).toEqual(STARTUP_WRITES);
        expect(socket.timeoutMs).toBe(60_000);
        expect(states).toEqual(['connecting', 'connected']);
        expect(client.isConnected()).toBe(true);
        expect(client.hasDiscoveredInputNames()).toBe(true);
        expect(client.getInputName(2)).toBe('Game');
        expect(client.getInputName(4)).toBe('Input 4');
        expect(client.getInputList().slice(0, 4)).toEqual(['Blu-ray', 'Game', 'TV', 'Input 4']);
        expect(discovered).toHaveBeenCalledWith(expect.objectContaining({complete: true, missing: []}));
    });

    it('finishes the handshake when input names never arrive', async () => {
        responder = null;
        const client = createClient();

        await expect(client.connect()).resolves.toBe(true);

        expect(lastSocket().writes).toEqual(STARTUP_WRITES);
        expect(client.hasDiscoveredInputNames()).toBe(true);
        expect(client.getInputList()).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith(
            'Input name discovery incomplete',
            {missing: Array.from({length: 15}, (_, index) => index + 1)},
        );
    });

    it('retries network errors until a connection succeeds', async () => {
        plan.push({error: 'ECONNREFUSED'}, {error: 'ECONNREFUSED'}, 'connect');
        const client = createClient();

        await expect(client.connect(5, 0)).resolves.toBe(true);

        expect(sockets.length).toBe(3);
        expect(sockets[0]?.destroyed).toBe(true);
        expect(logger.error).toHaveBeenCalledWith(
            'Network error connecting to Den',
            expect.objectContaining({attempt: 1, code: 'ECONNREFUSED'}),
        );
        expect(client.isConnected()).toBe(true);
    });

    it('gives up after the configured number of attempts', async () => {
        plan.push({error: 'EACCES'}, {error: 'EACCES'}, {error: 'EACCES'});
        const client = createClient();

        await expect(client.connect(3, 0)).resolves.toBe(false);

        expect(sockets.length).toBe(3);
        expect(logger.error).toHaveBeenCalledWith(
            'Unexpected connection error to Den',
            expect.objectContaining({attempt: 3, code: 'EACCES'}),
        );
        expect(logger.error).toHaveBeenCalledWith('Giving up on Den after 3 attempts');
        expect(client.getConnectionState()).toBe('disconnected');
    });

    it('abandons an attempt that exceeds the connect timeout', async () => {
        plan.push('hang', 'connect');
        const client = createClient({}, {connectTimeoutMs: 10});

        await expect(client.connect(2, 0)).resolves.toBe(true);

        expect(sockets.length).toBe(2);
        expect(sockets[0]?.destroyed).toBe(true);
        expect(logger.error).toHaveBeenCalledWith(
            'Network error connecting to Den',
            expect.objectContaining({attempt: 1, code: 'CONNECT_TIMEOUT'}),
        );
    });

    it('runs a disconnect requested during startup after the connect finishes', async () => {
        responder = null;
        const client = createClient();
        const order: string[] = [];
        let stateWhenConnected = '';
        client.on('connect', () => order.push('connect'));
        client.on('disconnect', (error) => order.push(error === null ? 'disconnect' : error.code));

        const connecting = client.connect().then((ok) => {
            stateWhenConnected = client.getConnectionState();
            return ok;
        });
        const disconnecting = client.disconnect();

        await expect(connecting).resolves.toBe(true);
        await disconnecting;

        const socket = lastSocket();
        expect(stateWhenConnected).toBe('connected');
        expect(order).toEqual(['connect', 'disconnect']);
        expect(socket.writes).toEqual(STARTUP_WRITES);
        expect(socket.destroyed).toBe(true);
        expect(client.getConnectionState()).toBe('disconnected');
    });

    it('does not count a discovery run without a connection', async () => {
        const client = createClient();
        const discovered = vi.fn();
        client.on('inputsDiscovered', discovered);

        const result = await client.discoverInputNames();

        expect(result.queried).toBe(0);
        expect(result.missing).toHaveLength(15);
        expect(client.hasDiscoveredInputNames()).toBe(false);
        expect(discovered).not.toHaveBeenCalled();
    });

    it('opens a single socket for repeated and concurrent connects', async () => {
        const client = createClient();

        await expect(Promise.all([client.connect(), client.connect()])).resolves.toEqual([true, true]);
        await expect(client.connect()).resolves.toBe(true);

        expect(sockets.length).toBe(1);
    });

    it('disconnects once and ignores a second request', async () => {
        const client = createClient();
        const socket = await connected(client);
        const onDisconnect = vi.fn();
        client.on('disconnect', onDisconnect);

        await client.disconnect();
        await client.close();

        expect(onDisconnect).toHaveBeenCalledTimes(1);
        expect(onDisconnect).toHaveBeenCalledWith(null);
        expect(socket.destroyed).toBe(true);
        expect(client.isConnected()).toBe(false);
        expect(logger.info).toHaveBeenCalledWith('Disconnected from Den');
    });

    it('reconnects on a fresh socket after the peer closed', async () => {
        const client = createClient();
        const first = await connected(client);
        first.emit('end');

        await expect(client.connect()).resolves.toBe(true);

        expect(sockets.length).toBe(2);
        expect(lastSocket()).not.toBe(first);
        expect(client.isConnected()).toBe(true);
    });
});

describe('AvrClient read loop', () => {
    it('reassembles lines split across reads and notifies the observer', async () => {
        const client = createClient();
        const socket = await connected(client);
        const updates: string[] = [];
        client.setUpdateCallback((line) => updates.push(line));

        socket.receive('Z1PO');
        socket.receive('W1\r\nZ1MUT0\r');

        expect(updates).toEqual(['Z1POW1', 'Z1MUT0']);
        expect(client.getZoneState(1)).toEqual({power: true, muted: false});
    });

    it('emits typed notifications for recognised lines', async () => {
        const client = createClient();
        const socket = await connected(client);
        const onNotification = vi.fn();
        client.on('notification', onNotification);

        socket.receive('Z1INP2\r\nIDMMRX 740\r\n');

        expect(onNotification).toHaveBeenNthCalledWith(
            1,
            {type: AvrNotificationType.Input, zone: 1, input: 2},
            'Z1INP2',
        );
        expect(client.getZoneValue(1, 'input')).toBe(2);
        expect(client.getCachedState('model')).toBe('MRX 740');
    });

    it('leaves the cache untouched for unknown lines', async () => {
        const client = createClient();
        const socket = await connected(client);
        const observer = vi.fn();
        const lines: string[] = [];
        client.setUpdateCallback(observer);
        client.on('line', (line) => lines.push(line));

        socket.receive('Z1XYZ\r\nhello\r\n');

        expect(lines).toEqual(['Z1XYZ', 'hello']);
        expect(observer).not.toHaveBeenCalled();
        expect(client.getZoneState(1)).toEqual({});
    });

    it('keeps reading when event listeners throw', async () => {
        const client = createClient();
        const socket = await connected(client);
        client.on('line', () => {
            throw new Error('line listener broke');
        });
        client.on('notification', () => {
            throw new Error('notification listener broke');
        });

        socket.receive('Z1POW1\r');
        socket.receive('Z1MUT1\r');

        expect(client.isConnected()).toBe(true);
        expect(client.getZoneState(1)).toEqual({power: true, muted: true});
        expect(logger.error).toHaveBeenCalledWith('Error in line listener', {
            message: 'line listener broke',
            line: 'Z1POW1',
        });
        expect(logger.error).toHaveBeenCalledWith('Error in notification listener', {
            message: 'notification listener broke',
            line: 'Z1MUT1',
        });
    });

    it('keeps reading when the observer throws', async () => {
        const client = createClient();
        const socket = await connected(client);
        client.setUpdateCallback(() => {
            throw new Error('observer broke');
        });

        socket.receive('Z1VOL-40\r\n');

        expect(client.getZoneValue(1, 'volume')).toBe(-40);
        expect(logger.error).toHaveBeenCalledWith('Error in update callback', {
            message: 'observer broke',
            line: 'Z1VOL-40',
        });
        expect(client.isConnected()).toBe(true);
    });

    it('marks the client disconnected when the peer closes', async () => {
        const client = createClient();
        const socket = await connected(client);
        const onDisconnect = vi.fn();
        const onError = vi.fn();
        client.on('disconnect', onDisconnect);
        client.on('error', onError);

        socket.emit('end');

        expect(client.isConnected()).toBe(false);
        expect(socket.destroyed).toBe(true);
        expect(onDisconnect).toHaveBeenCalledTimes(1);
        expect(onDisconnect).toHaveBeenCalledWith(expect.objectContaining({code: 'PEER_CLOSED'}));
        expect(onError).toHaveBeenCalledWith(expect.objectContaining({code: 'PEER_CLOSED'}));
        expect(logger.warn).toHaveBeenCalledWith(
            'Lost connection to Den',
            expect.objectContaining({code: 'PEER_CLOSED'}),
        );
        await expect(client.powerOn()).resolves.toBe(false);
    });

    it('only logs read inactivity', async () => {
        const client = createClient();
        const socket = await connected(client);

        socket.emit('timeout');

        expect(client.isConnected()).toBe(true);
        expect(logger.debug).toHaveBeenCalledWith('No data from Den for 60000ms');
    });

    it('drops the connection when an unterminated line grows too large', async () => {
        const client = createClient({maxLineBytes: 16});
        const socket = await connected(client);
        const onDisconnect = vi.fn();
        client.on('disconnect', onDisconnect);

        socket.receive(`Z1VOL-${'1'.repeat(20)}`);

        expect(client.isConnected()).toBe(false);
        expect(onDisconnect).toHaveBeenCalledWith(expect.objectContaining({code: 'STREAM_FRAMING_ERROR'}));
    });
});

describe('AvrClient commands', () => {
    it('refuses to send while disconnected', async () => {
        const client = createClient();

        await expect(client.sendCommand('Z1POW1')).resolves.toBe(false);

        expect(sockets.length).toBe(0);
        expect(logger.warn).toHaveBeenCalledWith('Cannot send command Z1POW1: not connected', {
            code: 'NOT_CONNECTED',
        });
    });

    it('downgrades to disconnected when a write fails', async () => {
        const client = createClient();
        const socket = await connected(client);
        const onDisconnect = vi.fn();
        client.on('disconnect', onDisconnect);
        socket.failWrites = true;

        await expect(client.powerOn()).resolves.toBe(false);

        expect(client.isConnected()).toBe(false);
        expect(onDisconnect).toHaveBeenCalledWith(
            expect.objectContaining({code: 'WRITE_FAILED', systemCode: 'EPIPE'}),
        );
        expect(logger.error).toHaveBeenCalledWith('Error sending command Z1POW1', {message: 'write EPIPE'});
    });

    it('writes power, volume, mute and input commands', async () => {
        const client = createClient();
        const socket = await connected(client);

        await client.powerOn();
        await client.powerOff(2);
        await client.setVolume(5);
        await client.setVolume(-200, 2);
        await client.setVolume(-37.6);
        await client.volumeUp();
        await client.volumeDown(3);
        await client.setMute(true);
        await client.selectInput(3, 2);

        expect(socket.writes).toEqual([
            'Z1POW1\r',
            'Z2POW0\r',
            'Z1VOL0\r',
            'Z2VOL-90\r',
            'Z1VOL-38\r',
            'Z1VUP\r',
            'Z3VDN\r',
            'Z1MUT1\r',
            'Z2INP3\r',
        ]);
    });

    it('queries zone status and device identity', async () => {
        const client = createClient();
        const socket = await connected(client);

        await expect(client.queryAllStatus(2)).resolves.toBe(true);
        await expect(client.queryDeviceInfo()).resolves.toBe(true);
        await expect(client.queryAllStatus(0)).resolves.toBe(false);

        expect(socket.writes).toEqual([
            'Z2POW?\r',
            'Z2VOL?\r',
            'Z2MUT?\r',
            'Z2INP?\r',
            'IDM?\r',
            'IDN?\r',
            'IDR?\r',
            'IDS?\r',
        ]);
    });

    it('selects inputs by discovered name', async () => {
        const client = createClient();
        const socket = await connected(client);

        await expect(client.selectInputByName(' game ')).resolves.toBe(true);
        await expect(client.selectInputByName('Radio')).resolves.toBe(false);

        expect(socket.writes).toEqual(['Z1INP2\r']);
        expect(client.getInputNumberByName('TV')).toBe(3);
        expect(logger.warn).toHaveBeenCalledWith(
            'Unknown input name "Radio"',
            expect.objectContaining({known: expect.arrayContaining(['Blu-ray', 'Game', 'TV'])}),
        );
    });

    it('rejects invalid zone numbers without writing', async () => {
        const client = createClient();
        const socket = await connected(client);

        await expect(client.powerOn(0)).resolves.toBe(false);
        await expect(client.selectInput(2, 1.5)).resolves.toBe(false);

        expect(socket.writes).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith('Rejected command', expect.objectContaining({code: 'INVALID_ARGUMENT'}));
        expect(() => client.zone(0)).toThrow(RangeError);
    });
});

describe('AvrClient error events', () => {
    it('reports rejected commands and sends without a connection', async () => {
        const client = createClient();
        const errors: Array<{code: string; domain: string}> = [];
        client.on('error', (error) => errors.push({code: error.code, domain: error.domain}));

        await expect(client.queryModel()).resolves.toBe(false);
        await connected(client);
        await expect(client.setMute(true, -1)).resolves.toBe(false);

        expect(errors).toEqual([
            {code: 'NOT_CONNECTED', domain: 'transport'},
            {code: 'INVALID_ARGUMENT', domain: 'command'},
        ]);
    });

    it('reports inputs that never answered discovery', async () => {
        responder = null;
        const client = createClient({inputCount: 2});
        const onError = vi.fn();
        client.on('error', onError);

        await expect(client.connect()).resolves.toBe(true);

        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError).toHaveBeenCalledWith(expect.objectContaining({
            code: 'DISCOVERY_INCOMPLETE',
            message: 'No name reported for inputs 1, 2',
            details: {missing: [1, 2]},
        }));
    });
});

describe('Zone', () => {
    it('scopes commands and cached state to one zone', async () => {
        const client = createClient({}, {zones: [{zone: 1, name: 'Main'}, {zone: 2, name: 'Patio'}]});
        const socket = await connected(client);
        const patio = client.zone(2);

        socket.receive('Z2MUT1\r\nZ2SIP"Streamer"\r\n');
        await patio.toggleMute();
        await patio.setVolume(-30);

        expect(patio.name).toBe('Patio');
        expect(patio.state).toEqual({muted: true, inputName: 'Streamer'});
        expect(socket.writes).toEqual(['Z2MUT0\r', 'Z2VOL-30\r']);
        expect(client.zone(3).name).toBe('Zone 3');
        expect(client.zones().map((zone) => zone.name)).toEqual(['Main', 'Patio']);
    });

    it('treats an unreported mute flag as unmuted', async () => {
        const client = createClient();
        const socket = await connected(client);

        await client.zone(1).toggleMute();
        await client.zone(1).refresh();

        expect(socket.writes).toEqual(['Z1MUT1\r', 'Z1POW?\r', 'Z1VOL?\r', 'Z1MUT?\r', 'Z1INP?\r']);
    });
});
