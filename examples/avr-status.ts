import {AvrClient, delay, loadDeviceConfig} from '../src';

/**
 * Connects with a JSON device file, refreshes every enabled zone and prints the cache.
 * Usage: avr-status.ts <config.json> [settleMs]
 */
async function main(): Promise<void> {
    const [path = 'examples/device.example.json', settle = '500'] = process.argv.slice(2);
    const config = await loadDeviceConfig(path);
    const client = new AvrClient(config);

    if (!(await client.connect())) {
        process.exitCode = 1;
        return;
    }

    for (const zone of client.zones()) {
        await zone.refresh();
    }
    await delay(Number(settle) || 0);

    for (const zone of client.zones()) {
        const {power, volume, muted, input} = zone.state;
        const source = input === undefined ? 'unknown' : client.getInputName(input);
        console.log(
            `${zone.name}: power=${power ?? '?'} volume=${volume ?? '?'}dB muted=${muted ?? '?'} input=${source}`,
        );
    }

    await client.disconnect();
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
