/**
 * Last-known receiver state, fed only by parsed notifications.
 * @module core/StateCache
 */
import {AvrNotificationType, defaultInputName, type AvrNotification} from '../protocols/avr/parser';

/** Cached values for one zone. A missing field means "not reported yet". */
export type ZoneState = {
    power?: boolean;
    volume?: number;
    muted?: boolean;
    input?: number;
    inputName?: string;
    audioFormat?: string;
};

export type ZoneStateKey = keyof ZoneState;

/** Device-wide identity values. */
export type DeviceInfo = {
    model?: string;
    deviceName?: string;
    region?: string;
    softwareVersion?: string;
};

export type DeviceInfoKey = keyof DeviceInfo;

/** Plain-object copy of the whole cache. */
export type StateSnapshot = DeviceInfo & {
    inputNames: Record<number, string>;
    zones: Record<number, ZoneState>;
};

export class StateCache {
    private readonly device: DeviceInfo = {};
    private readonly inputNames = new Map<number, string>();
    private readonly zones = new Map<number, ZoneState>();

    /**
     * Apply one notification.
     * @returns `true` when the notification targets a cached key.
     */
    public apply(notification: AvrNotification): boolean {
        switch (notification.type) {
            case AvrNotificationType.Model:
                this.device.model = notification.value;
                return true;
            case AvrNotificationType.DeviceName:
                this.device.deviceName = notification.value;
                return true;
            case AvrNotificationType.Region:
                this.device.region = notification.value;
                return true;
            case AvrNotificationType.SoftwareVersion:
                this.device.softwareVersion = notification.value;
                return true;
            case AvrNotificationType.InputName:
                this.inputNames.set(notification.input, notification.name);
                return true;
            case AvrNotificationType.Power:
                this.zoneEntry(notification.zone).power = notification.on;
                return true;
            case AvrNotificationType.Volume:
                this.zoneEntry(notification.zone).volume = notification.volume;
                return true;
            case AvrNotificationType.Mute:
                this.zoneEntry(notification.zone).muted = notification.muted;
                return true;
            case AvrNotificationType.Input:
                this.zoneEntry(notification.zone).input = notification.input;
                return true;
            case AvrNotificationType.InputLabel:
                this.zoneEntry(notification.zone).inputName = notification.name;
                return true;
            case AvrNotificationType.AudioFormat:
                this.zoneEntry(notification.zone).audioFormat = notification.format;
                return true;
            case AvrNotificationType.Unrecognized:
                return false;
        }
    }

    public getDeviceValue<K extends DeviceInfoKey>(key: K): DeviceInfo[K] {
        return this.device[key];
    }

    public getDeviceInfo(): Readonly<DeviceInfo> {
        return {...this.device};
    }

    /** Copy of one zone's record; empty when the zone never reported. */
    public getZoneState(zone: number): Readonly<ZoneState> {
        return {...this.zones.get(zone)};
    }

    public getZoneValue<K extends ZoneStateKey>(zone: number, key: K): ZoneState[K] {
        return this.zones.get(zone)?.[key];
    }

    /** Zone numbers that have reported at least one value, ascending. */
    public knownZones(): number[] {
        return Array.from(this.zones.keys()).sort((a, b) => a - b);
    }

    public getInputNames(): ReadonlyMap<number, string> {
        return new Map(this.inputNames);
    }

    public getInputName(input: number): string {
        return this.inputNames.get(input) ?? defaultInputName(input);
    }

    /** Exact match first, then a case-insensitive match ignoring surrounding whitespace. */
    public findInputByName(name: string): number | undefined {
        for (const [input, inputName] of this.inputNames) {
            if (inputName === name) return input;
        }
        const wanted = name.trim().toLowerCase();
        for (const [input, inputName] of this.inputNames) {
            if (inputName.trim().toLowerCase() === wanted) return input;
        }
        return undefined;
    }

    /** Discovered input names ordered by input index. */
    public getInputList(): string[] {
        return Array.from(this.inputNames.entries())
            .sort(([a], [b]) => a - b)
            .map(([, name]) => name);
    }

    public snapshot(): StateSnapshot {
        const zones: Record<number, ZoneState> = {};
        for (const [zone, state] of this.zones) zones[zone] = {...state};
        return {
            ...this.device,
            inputNames: Object.fromEntries(this.inputNames),
            zones,
        };
    }

    private zoneEntry(zone: number): ZoneState {
        let entry = this.zones.get(zone);
        if (!entry) {
            entry = {};
            this.zones.set(zone, entry);
        }
        return entry;
    }
}
