/**
 * Receiver line-protocol constants.
 * @module avr/constants
 */
export const AVR_DEFAULT_PORT = 14999;
export const AVR_DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const AVR_DEFAULT_MAX_RETRIES = 5;
export const AVR_DEFAULT_RETRY_DELAY_MS = 2000;
export const AVR_DEFAULT_LIVENESS_TIMEOUT_MS = 60000;
export const AVR_DEFAULT_STARTUP_DELAY_MS = 100;
/** Pause between paced commands so the receiver's input buffer is not overrun. */
export const AVR_DEFAULT_COMMAND_DELAY_MS = 50;
/** Pause between the queries of a full zone refresh. */
export const AVR_DEFAULT_STATUS_QUERY_DELAY_MS = 100;
export const AVR_DEFAULT_DISCOVERY_TIMEOUT_MS = 3000;
export const AVR_DEFAULT_DISCOVERY_POLL_MS = 100;
export const AVR_DEFAULT_MAX_LINE_BYTES = 64 * 1024;

/** Number of input slots queried during discovery. */
export const AVR_INPUT_COUNT = 15;
export const AVR_VOLUME_MIN_DB = -90;
export const AVR_VOLUME_MAX_DB = 0;

/** Outbound line terminator. */
export const AVR_COMMAND_TERMINATOR = '\r';
/** Disables command echo so only notifications come back. */
export const ECHO_OFF_COMMAND = 'ECH0';

/** Zone-scoped verbs, in the order notifications are matched. */
export enum ZoneVerb {
    Power = 'POW',
    Volume = 'VOL',
    Mute = 'MUT',
    Input = 'INP',
    InputLabel = 'SIP',
    AudioFormat = 'AIC',
    VolumeUp = 'VUP',
    VolumeDown = 'VDN',
}

/** Device-wide identity prefixes. */
export enum IdentityPrefix {
    Model = 'IDM',
    DeviceName = 'IDN',
    Region = 'IDR',
    SoftwareVersion = 'IDS',
}

export const INPUT_NAME_PREFIX = 'ISN';

export enum ConnectionState {
    Disconnected = 'disconnected',
    Connecting = 'connecting',
    Connected = 'connected',
}
