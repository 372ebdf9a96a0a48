/**
 * Host-dependent configuration values.
 *
 * A value may be one string, an ordered list of candidates, or a per-OS map.
 * It is resolved once when the configuration is loaded.
 */

import * as fs from 'fs';
import { ContractError } from '../shared/utils/errors.js';
import { Validators } from '../shared/utils/JsonValidator.js';

export type OsId = 'linux' | 'darwin' | 'win32';

export type ConfigValue =
    | { kind: 'single'; value: string }
    | { kind: 'list'; values: string[] }
    | { kind: 'by-os'; values: Partial<Record<OsId, string>> };

const OS_IDS: readonly OsId[] = ['linux', 'darwin', 'win32'];

function isOsId(value: string): value is OsId {
    return OS_IDS.some(id => id === value);
}

/**
 * Classifies a raw JSON value.
 * @throws ContractError when the shape is none of the three variants
 */
export function toConfigValue(raw: unknown, keyPath: string): ConfigValue {
    if (Validators.string(raw)) {
        return { kind: 'single', value: raw };
    }
    if (Validators.array(Validators.string)(raw)) {
        return { kind: 'list', values: raw };
    }
    if (Validators.object(raw)) {
        const values: Partial<Record<OsId, string>> = {};
        for (const [key, value] of Object.entries(raw)) {
            if (!isOsId(key) || !Validators.string(value)) {
                throw new ContractError(`${keyPath}: per-OS entries must map ${OS_IDS.join('/')} to strings`, { key });
            }
            values[key] = value;
        }
        return { kind: 'by-os', values };
    }
    throw new ContractError(`${keyPath}: expected a string, a list of strings or a per-OS map`, { keyPath });
}

export interface ResolveOptions {
    platform?: string;
    /** Decides which list candidate wins; the first existing path by default */
    exists?: (candidate: string) => boolean;
}

export function resolveConfigValue(value: ConfigValue, options: ResolveOptions = {}): string | undefined {
    const platform = options.platform ?? process.platform;
    const exists = options.exists ?? fs.existsSync;

    switch (value.kind) {
        case 'single':
            return value.value;
        case 'list':
            return value.values.find(candidate => exists(candidate)) ?? value.values[0];
        case 'by-os':
            return isOsId(platform) ? value.values[platform] : undefined;
    }
}
