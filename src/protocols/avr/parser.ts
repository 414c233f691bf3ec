/**
 * Receiver notification parser.
 * @module avr/parser
 */
import {IdentityPrefix, INPUT_NAME_PREFIX, ZoneVerb} from './constants';

export enum AvrNotificationType {
    Model = 'model',
    DeviceName = 'deviceName',
    Region = 'region',
    SoftwareVersion = 'softwareVersion',
    InputName = 'inputName',
    Power = 'power',
    Volume = 'volume',
    Mute = 'mute',
    Input = 'input',
    InputLabel = 'inputLabel',
    AudioFormat = 'audioFormat',
    Unrecognized = 'unrecognized',
}

export type IdentityNotification = {
    type:
        | AvrNotificationType.Model
        | AvrNotificationType.DeviceName
        | AvrNotificationType.Region
        | AvrNotificationType.SoftwareVersion;
    value: string;
};

/** Display name reported for one input slot (`ISN`). */
export type InputNameNotification = {
    type: AvrNotificationType.InputName;
    input: number;
    name: string;
};

export type PowerNotification = {
    type: AvrNotificationType.Power;
    zone: number;
    on: boolean;
};

export type VolumeNotification = {
    type: AvrNotificationType.Volume;
    zone: number;
    /** Level in dB as reported by the receiver. */
    volume: number;
};

export type MuteNotification = {
    type: AvrNotificationType.Mute;
    zone: number;
    muted: boolean;
};

export type InputNotification = {
    type: AvrNotificationType.Input;
    zone: number;
    input: number;
};

/** Name of the input currently playing in a zone (`SIP`). */
export type InputLabelNotification = {
    type: AvrNotificationType.InputLabel;
    zone: number;
    name: string;
};

export type AudioFormatNotification = {
    type: AvrNotificationType.AudioFormat;
    zone: number;
    format: string;
};

export type UnrecognizedNotification = {
    type: AvrNotificationType.Unrecognized;
    line: string;
};

export type ZoneNotification =
    | PowerNotification
    | VolumeNotification
    | MuteNotification
    | InputNotification
    | InputLabelNotification
    | AudioFormatNotification;

export type AvrNotification =
    | IdentityNotification
    | InputNameNotification
    | ZoneNotification
    | UnrecognizedNotification;

const IDENTITY_TYPES: ReadonlyArray<[IdentityPrefix, IdentityNotification['type']]> = [
    [IdentityPrefix.Model, AvrNotificationType.Model],
    [IdentityPrefix.DeviceName, AvrNotificationType.DeviceName],
    [IdentityPrefix.Region, AvrNotificationType.Region],
    [IdentityPrefix.SoftwareVersion, AvrNotificationType.SoftwareVersion],
];

const INPUT_NAME_PATTERN = new RegExp(`^${INPUT_NAME_PREFIX}(\\d+)"([^"]*)"`);
const ZONE_PATTERN = /^Z(\d+)(.*)$/;

const ZONE_VERBS = [
    ZoneVerb.Power,
    ZoneVerb.Volume,
    ZoneVerb.Mute,
    ZoneVerb.Input,
    ZoneVerb.InputLabel,
    ZoneVerb.AudioFormat,
] as const;

type NotifyingVerb = (typeof ZONE_VERBS)[number];

const unrecognized = (line: string): UnrecognizedNotification => ({
    type: AvrNotificationType.Unrecognized,
    line,
});

/** Fallback display name for an input slot the receiver left blank. */
export const defaultInputName = (input: number): string => `Input ${input}`;

/**
 * Locate the zone verb in the part of the line before any quoted argument,
 * so an input called "POWER" is never read as a power notification.
 */
const findVerb = (rest: string): {verb: NotifyingVerb; argument: string} | null => {
    const head = rest.split('"', 1)[0] ?? '';
    let found: {verb: NotifyingVerb; index: number} | null = null;
    for (const verb of ZONE_VERBS) {
        const index = head.indexOf(verb);
        if (index >= 0 && (found === null || index < found.index)) {
            found = {verb, index};
        }
    }
    if (!found) return null;
    return {verb: found.verb, argument: rest.slice(found.index + found.verb.length)};
};

const parseZoneLine = (line: string, zone: number, rest: string): AvrNotification => {
    const located = findVerb(rest);
    if (!located) return unrecognized(line);
    const {verb, argument} = located;

    switch (verb) {
        case ZoneVerb.Power: {
            const match = /^([01])/.exec(argument);
            return match ? {type: AvrNotificationType.Power, zone, on: match[1] === '1'} : unrecognized(line);
        }
        case ZoneVerb.Volume: {
            const match = /^(-?\d+)/.exec(argument);
            if (!match) return unrecognized(line);
            const volume = Number.parseInt(match[1] ?? '', 10);
            // "-0" is reported as 0.
            return {type: AvrNotificationType.Volume, zone, volume: volume === 0 ? 0 : volume};
        }
        case ZoneVerb.Mute: {
            const match = /^([01])/.exec(argument);
            return match ? {type: AvrNotificationType.Mute, zone, muted: match[1] === '1'} : unrecognized(line);
        }
        case ZoneVerb.Input: {
            const match = /^(\d+)/.exec(argument);
            return match
                ? {type: AvrNotificationType.Input, zone, input: Number.parseInt(match[1] ?? '', 10)}
                : unrecognized(line);
        }
        case ZoneVerb.InputLabel: {
            const match = /^"([^"]*)"/.exec(argument);
            return match
                ? {type: AvrNotificationType.InputLabel, zone, name: match[1] ?? ''}
                : unrecognized(line);
        }
        case ZoneVerb.AudioFormat: {
            const match = /^"([^"]*)"/.exec(argument);
            return match
                ? {type: AvrNotificationType.AudioFormat, zone, format: match[1] ?? ''}
                : unrecognized(line);
        }
    }
};

/**
 * Classify one protocol line.
 * Never throws: lines that match no known pattern come back as
 * {@link AvrNotificationType.Unrecognized}.
 */
export const parseLine = (raw: string): AvrNotification => {
    const line = raw.trim();

    for (const [prefix, type] of IDENTITY_TYPES) {
        if (line.startsWith(prefix)) {
            return {type, value: line.slice(prefix.length).trim()};
        }
    }

    if (line.startsWith(INPUT_NAME_PREFIX)) {
        const match = INPUT_NAME_PATTERN.exec(line);
        if (!match) return unrecognized(line);
        const input = Number.parseInt(match[1] ?? '', 10);
        const name = (match[2] ?? '').trim();
        return {
            type: AvrNotificationType.InputName,
            input,
            name: name || defaultInputName(input),
        };
    }

    const zoneMatch = ZONE_PATTERN.exec(line);
    if (zoneMatch) {
        return parseZoneLine(line, Number.parseInt(zoneMatch[1] ?? '', 10), zoneMatch[2] ?? '');
    }

    return unrecognized(line);
};

export const isZoneNotification = (notification: AvrNotification): notification is ZoneNotification =>
    'zone' in notification;
