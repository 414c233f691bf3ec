/**
 * Outbound command builders. Each returns the command text without terminator.
 * @module avr/commands
 */
import {clampVolume, isPositiveInteger} from '../../core/utils';
import {IdentityPrefix, INPUT_NAME_PREFIX, ZoneVerb} from './constants';

const assertZone = (zone: number): void => {
    if (!isPositiveInteger(zone)) {
        throw new RangeError(`Zone must be a positive integer, got ${zone}`);
    }
};

const assertInput = (input: number): void => {
    if (!isPositiveInteger(input)) {
        throw new RangeError(`Input must be a positive integer, got ${input}`);
    }
};

const zoneCommand = (zone: number, verb: ZoneVerb, argument = ''): string => {
    assertZone(zone);
    return `Z${zone}${verb}${argument}`;
};

const flag = (value: boolean): string => (value ? '1' : '0');

export const powerCommand = (zone: number, on: boolean): string =>
    zoneCommand(zone, ZoneVerb.Power, flag(on));

/** Absolute level; clamped to [-90, 0] dB before encoding. */
export const volumeCommand = (zone: number, db: number): string =>
    zoneCommand(zone, ZoneVerb.Volume, String(clampVolume(db)));

export const volumeUpCommand = (zone: number): string => zoneCommand(zone, ZoneVerb.VolumeUp);

export const volumeDownCommand = (zone: number): string => zoneCommand(zone, ZoneVerb.VolumeDown);

export const muteCommand = (zone: number, muted: boolean): string =>
    zoneCommand(zone, ZoneVerb.Mute, flag(muted));

export const inputCommand = (zone: number, input: number): string => {
    assertInput(input);
    return zoneCommand(zone, ZoneVerb.Input, String(input));
};

export const powerQuery = (zone: number): string => zoneCommand(zone, ZoneVerb.Power, '?');

export const volumeQuery = (zone: number): string => zoneCommand(zone, ZoneVerb.Volume, '?');

export const muteQuery = (zone: number): string => zoneCommand(zone, ZoneVerb.Mute, '?');

export const inputQuery = (zone: number): string => zoneCommand(zone, ZoneVerb.Input, '?');

/** The four queries that refresh a zone, in the order they are sent. */
export const zoneStatusQueries = (zone: number): string[] => [
    powerQuery(zone),
    volumeQuery(zone),
    muteQuery(zone),
    inputQuery(zone),
];

export const modelQuery = (): string => `${IdentityPrefix.Model}?`;

export const deviceInfoQueries = (): string[] => [
    `${IdentityPrefix.Model}?`,
    `${IdentityPrefix.DeviceName}?`,
    `${IdentityPrefix.Region}?`,
    `${IdentityPrefix.SoftwareVersion}?`,
];

export const inputNameQuery = (input: number): string => {
    assertInput(input);
    return `${INPUT_NAME_PREFIX}${input}?`;
};
