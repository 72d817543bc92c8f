/**
 * Package metadata (name and version) read from package.json beside the sources.
 */
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

const packageSchema = z.object({
    name: z.string(),
    version: z.string()
});

export type PackageInfo = z.output<typeof packageSchema>;

let cached: PackageInfo | null = null;

/**
 * Reads package.json once; both src/utils and dist/utils sit two levels below it.
 * Falls back to placeholder values if the file cannot be read.
 */
export function getPackageInfo(): PackageInfo {
    if (cached) {
        return cached;
    }

    const __filename = fileURLToPath(import.meta.url);
    const packageJSONPath = join(dirname(__filename), '../../package.json');

    try {
        cached = packageSchema.parse(JSON.parse(readFileSync(packageJSONPath, 'utf-8')));
    } catch {
        cached = { name: 'github-telegram-relay', version: '0.0.0' };
    }
    return cached;
}
