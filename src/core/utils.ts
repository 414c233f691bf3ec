/**
 * Shared numeric and timing helpers.
 * @module core/utils
 */
import {AVR_VOLUME_MAX_DB, AVR_VOLUME_MIN_DB} from '../protocols/avr/constants';

/** Resolve after `ms` milliseconds. */
export const delay = (ms: number): Promise<void> =>
    new Promise((resolve) => setTimeout(resolve, ms));

/** Clamp and round a level to the receiver's dB range. Non-finite input maps to the minimum. */
export const clampVolume = (db: number): number => {
    if (!Number.isFinite(db)) return AVR_VOLUME_MIN_DB;
    const rounded = Math.round(db);
    // Avoid encoding "-0".
    if (rounded === 0) return 0;
    return Math.min(AVR_VOLUME_MAX_DB, Math.max(AVR_VOLUME_MIN_DB, rounded));
};

/** Map a dB level to 0-100 for UI sliders. */
export const dbToPercentage = (db: number): number => {
    const range = AVR_VOLUME_MAX_DB - AVR_VOLUME_MIN_DB;
    const percentage = ((db - AVR_VOLUME_MIN_DB) / range) * 100;
    return Math.min(100, Math.max(0, percentage));
};

/** Inverse of {@link dbToPercentage}, truncated to whole dB like the receiver expects. */
export const percentageToDb = (percentage: number): number => {
    const range = AVR_VOLUME_MAX_DB - AVR_VOLUME_MIN_DB;
    return clampVolume(Math.trunc((percentage * range) / 100 + AVR_VOLUME_MIN_DB));
};

/** `true` for integers >= 1. */
export const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value >= 1;
