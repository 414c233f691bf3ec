import {AvrClient, logManager, type LogLevel} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    name: string;
    level: LogLevel;
};

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'none'];

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: '127.0.0.1', name: 'Receiver', level: 'info'};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--name=')) {
            options.name = arg.substring('--name='.length);
        } else if (arg.startsWith('--log=')) {
            const level = LEVELS.find((entry) => entry === arg.substring('--log='.length));
            if (level) options.level = level;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));
logManager.configure({level: options.level});

const client = new AvrClient({name: options.name, host: options.host, port: options.port});

client.on('inputsDiscovered', (result) => {
    const names = client.getInputList().map((name, index) => `${index + 1}=${name}`);
    console.log(`Inputs (${result.complete ? 'complete' : `missing ${result.missing.join(',')}`}): ${names.join(' ')}`);
});

client.setUpdateCallback((line) => {
    console.log(`< ${line}`);
});

client.on('disconnect', (error) => {
    console.log(error ? `Connection lost: ${error.message}` : 'Disconnected');
});

client.on('error', (error) => {
    console.error('[AvrError]', error.code, error.message);
});

async function main(): Promise<void> {
    if (!(await client.connect())) {
        process.exitCode = 1;
        return;
    }
    await client.queryDeviceInfo();
    await client.queryAllStatus();

    process.once('SIGINT', () => {
        client.disconnect().then(
            () => console.log(JSON.stringify(client.getStateSnapshot(), null, 2)),
            (err: unknown) => console.error(err),
        );
    });
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
