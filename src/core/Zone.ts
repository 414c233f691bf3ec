/**
 * Per-zone handle over a receiver client.
 * @module core/Zone
 */
import type {AvrClient} from '../protocols/avr/client';
import type {ZoneState} from './StateCache';

/** Commands and cached state scoped to one zone number. */
export class Zone {
    /**
     * @param client Owning client; all commands go through it.
     * @param id Zone number (1 = main zone).
     * @param name Configured display name, if any.
     */
    constructor(
        private readonly client: AvrClient,
        public readonly id: number,
        public readonly name = `Zone ${id}`,
    ) {}

    /** Last-known values; fields the receiver has not reported are absent. */
    public get state(): Readonly<ZoneState> {
        return this.client.getZoneState(this.id);
    }

    public powerOn(): Promise<boolean> {
        return this.client.powerOn(this.id);
    }

    public powerOff(): Promise<boolean> {
        return this.client.powerOff(this.id);
    }

    public setVolume(db: number): Promise<boolean> {
        return this.client.setVolume(db, this.id);
    }

    public volumeUp(): Promise<boolean> {
        return this.client.volumeUp(this.id);
    }

    public volumeDown(): Promise<boolean> {
        return this.client.volumeDown(this.id);
    }

    public setMute(muted: boolean): Promise<boolean> {
        return this.client.setMute(muted, this.id);
    }

    /** Invert the cached mute flag. An unreported flag counts as unmuted. */
    public toggleMute(): Promise<boolean> {
        return this.client.setMute(!(this.state.muted ?? false), this.id);
    }

    public selectInput(input: number): Promise<boolean> {
        return this.client.selectInput(input, this.id);
    }

    public selectSource(name: string): Promise<boolean> {
        return this.client.selectInputByName(name, this.id);
    }

    /** Re-query power, volume, mute and input. */
    public refresh(): Promise<boolean> {
        return this.client.queryAllStatus(this.id);
    }
}
