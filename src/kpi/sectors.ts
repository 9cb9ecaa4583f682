import type { SectorDirectory } from '../rules/types.js';

/**
 * Canonical sector id for a user-supplied name. Unknown names come back
 * trimmed but otherwise unchanged; an unknown sector simply has no stays.
 */
export function resolveSectorId(input: string, directory: SectorDirectory): string {
    const trimmed = input.trim();
    const key = trimmed.toLowerCase();

    for (const sector of directory.sectors) {
        if (sector.id.toLowerCase() === key) {
            return sector.id;
        }
        if (sector.aliases.some((alias) => alias.trim().toLowerCase() === key)) {
            return sector.id;
        }
    }

    return trimmed;
}
