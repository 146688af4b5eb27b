import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { getDailyLogPath } from '../utils/logger.js';

const TAIL_CONTEXT_BYTES = 4096;

/**
 * Handle the `logs` command.
 * Prints or tails today's monitor log (`LOG_DIR/YYYY-MM-DD.md`).
 */
export async function handleLogsCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = getDailyLogPath();

    if (!fs.existsSync(logPath)) {
        console.error(`[Logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[Logs] Following logs from ${logPath}...\n`);
        tailFile(logPath);
        // The watcher keeps the process alive until it is interrupted.
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

/**
 * Tail a file similar to `tail -f`, starting with its last few KB.
 */
function tailFile(filePath: string): void {
    let position = fs.statSync(filePath).size;
    const startPos = Math.max(0, position - TAIL_CONTEXT_BYTES);

    if (startPos < position) {
        fs.createReadStream(filePath, { start: startPos, encoding: 'utf8' }).pipe(process.stdout, { end: false });
    }

    try {
        fs.watch(filePath, (eventType) => {
            if (eventType !== 'change') return;

            const stats = fs.statSync(filePath);
            if (stats.size > position) {
                fs.createReadStream(filePath, { start: position, end: stats.size - 1, encoding: 'utf8' })
                    .on('data', (chunk) => {
                        process.stdout.write(chunk);
                    });
                position = stats.size;
            } else if (stats.size < position) {
                // Truncated or rolled over.
                position = stats.size;
            }
        });
    } catch (err) {
        console.error(`[Logs] Failed to watch file: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
    }
}
