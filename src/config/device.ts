/**
 * Device and zone configuration.
 * @module config/device
 */
import {readFile} from 'fs/promises';
import {z} from 'zod';

import {
    AVR_DEFAULT_CONNECT_TIMEOUT_MS,
    AVR_DEFAULT_MAX_RETRIES,
    AVR_DEFAULT_PORT,
    AVR_DEFAULT_RETRY_DELAY_MS,
} from '../protocols/avr/constants';
import {AvrError} from '../protocols/avr/errors';

export const ZoneConfigSchema = z.object({
    zone: z.number().int().min(1).max(8).describe('Receiver zone number'),
    name: z.string().min(1).describe('Display name for the zone'),
    enabled: z.boolean().default(true),
});

export type ZoneConfig = z.infer<typeof ZoneConfigSchema>;

export const DeviceConfigSchema = z
    .object({
        identifier: z.string().min(1).optional().describe('Stable id; defaults to host:port'),
        name: z.string().min(1).describe('Receiver display name'),
        host: z.string().min(1).describe('Receiver hostname or IP address'),
        port: z.number().int().min(1).max(65535).default(AVR_DEFAULT_PORT),
        connectTimeoutMs: z.number().int().positive().default(AVR_DEFAULT_CONNECT_TIMEOUT_MS),
        maxRetries: z.number().int().min(1).default(AVR_DEFAULT_MAX_RETRIES),
        retryDelayMs: z.number().int().min(0).default(AVR_DEFAULT_RETRY_DELAY_MS),
        zones: z.array(ZoneConfigSchema).min(1).default([{zone: 1, name: 'Main', enabled: true}]),
    })
    .superRefine((config, ctx) => {
        const seen = new Set<number>();
        config.zones.forEach((zone, index) => {
            if (seen.has(zone.zone)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `Duplicate zone ${zone.zone}`,
                    path: ['zones', index, 'zone'],
                });
            }
            seen.add(zone.zone);
        });
    })
    .transform((config) => ({
        ...config,
        identifier: config.identifier ?? `${config.host}:${config.port}`,
    }));

/** Validated configuration with defaults applied. */
export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
/** Configuration as written by hand, before defaults. */
export type DeviceConfigInput = z.input<typeof DeviceConfigSchema>;

const formatIssue = (issue: z.ZodIssue): string =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * Validate raw configuration.
 * Throws `AvrError(CONFIG_INVALID)` listing the zod issues.
 */
export const parseDeviceConfig = (input: unknown): DeviceConfig => {
    const result = DeviceConfigSchema.safeParse(input);
    if (!result.success) {
        const {issues} = result.error;
        throw new AvrError({
            message: `Invalid device configuration: ${issues.map(formatIssue).join('; ')}`,
            domain: 'config',
            code: 'CONFIG_INVALID',
            details: {issues},
        });
    }
    return result.data;
};

/** Read and validate a JSON configuration file. */
export const loadDeviceConfig = async (path: string): Promise<DeviceConfig> => {
    const text = await readFile(path, 'utf8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new AvrError({
            message: `Configuration file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
            domain: 'config',
            code: 'CONFIG_INVALID',
            details: {path},
        });
    }
    return parseDeviceConfig(raw);
};
