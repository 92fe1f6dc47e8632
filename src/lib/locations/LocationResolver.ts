// File: src/lib/locations/LocationResolver.ts
import path from 'path';
import { AliasTable } from './AliasTable';

// "d", "D:", "drive d", "drive D "
const DRIVE_REFERENCE = /^(?:drive\s+)?([a-zA-Z])[:\s]?$/i;
// "D:", "D:\\Movies", "d:stuff"
const VOLUME_QUALIFIED = /^[a-zA-Z]:/;

/**
 * Turns the location words an interpreter hands us ("Desktop", "drive d",
 * "reports/2024") into absolute paths. Pure path computation: existence is
 * the caller's concern.
 */
export class LocationResolver {
    constructor(
        private readonly aliases: AliasTable,
        private readonly pathApi: path.PlatformPath = path,
    ) {}

    resolve(token: string, currentPath: string): string {
        const trimmed = token.trim();
        if (!trimmed) {
            return currentPath;
        }

        if (this.pathApi.isAbsolute(trimmed)) {
            return trimmed;
        }

        const alias = this.aliases.get(trimmed);
        if (alias !== undefined) {
            return alias;
        }

        const drive = DRIVE_REFERENCE.exec(trimmed);
        if (drive) {
            const root = this.aliases.volumeRoot(drive[1]);
            if (root !== undefined) {
                return root;
            }
        }

        if (VOLUME_QUALIFIED.test(trimmed)) {
            return trimmed;
        }

        return this.pathApi.normalize(this.pathApi.join(currentPath, trimmed));
    }
}
