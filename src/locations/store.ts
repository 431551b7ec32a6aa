import path from 'node:path'
import { z } from 'zod'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { LocationTable } from './table.js'

export const LocationsSchema = z.record(
    z.object({
        x: z.number().int(),
        y: z.number().int(),
    })
)

/**
 * Reads a locations file. A missing or invalid file yields an empty table so a
 * recording can always start.
 */
export async function loadLocations(fs: FileSystem, filePath: string | undefined, logger?: Logger): Promise<LocationTable> {
    if (!filePath) return new LocationTable()
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return new LocationTable(LocationsSchema.parse(raw))
        }
        logger?.info({ filePath }, 'No locations file, starting empty')
    } catch (error) {
        logger?.warn({ filePath, error }, 'Failed to load locations, starting empty')
    }
    return new LocationTable()
}

/** Writes the table when it has unsaved changes and a destination is known. */
export async function flushLocations(fs: FileSystem, table: LocationTable, filePath?: string): Promise<boolean> {
    if (!table.dirty || !filePath) return false
    await fs.mkdir(path.dirname(filePath))
    await fs.writeJSON(filePath, table.toJSON())
    table.markClean()
    return true
}
