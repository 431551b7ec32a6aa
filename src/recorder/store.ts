import path from 'node:path'
import { z } from 'zod'
import { INFO_FILE, LOCATIONS_FILE, SCRIPT_FILE } from '../config/defaults.js'
import { FatalError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { flushLocations, loadLocations } from '../locations/store.js'
import type { LocationTable } from '../locations/table.js'
import type { Logger } from '../logger/index.js'
import { parseScript } from '../script/parser.js'
import { serializeScript } from '../script/serializer.js'
import type { ParseResult, Script } from '../script/types.js'

const ID_PREFIX = 'rec'
const ID_PATTERN = /^rec(\d+)$/

export const RecordingInfoSchema = z.object({
    id: z.string(),
    created: z.string(),
    duration: z.number(),
    commands: z.number().int(),
    locations: z.number().int(),
    description: z.string(),
})

export type RecordingInfo = z.infer<typeof RecordingInfoSchema>

export interface RecordingSummary {
    id: string
    dir: string
    info?: RecordingInfo
}

export interface RecordingPaths {
    dir: string
    script: string
    locations: string
    info: string
}

export interface SaveInput {
    commands: Script
    duration: number
    newLocations: number
}

export interface LoadedRecording extends ParseResult {
    /** Recording id, or undefined when loaded from a bare script path. */
    id?: string
    paths: RecordingPaths
}

const pad = (n: number) => String(n).padStart(2, '0')

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    return `${day} ${time}`
}

export function recordingHeader(id: string, recording: SaveInput, date: Date): string[] {
    return [
        `# Recording ID: ${id}`,
        `# Recorded: ${formatTimestamp(date)}`,
        `# Duration: ${recording.duration.toFixed(1)} seconds`,
        `# Total commands: ${recording.commands.length}`,
        `# New locations saved: ${recording.newLocations}`,
        '',
        '# To run this recording:',
        `# mimic play ${id}`,
        '',
    ]
}

function idNumber(id: string): number | undefined {
    const match = ID_PATTERN.exec(id)
    return match?.[1] ? Number(match[1]) : undefined
}

function pathsIn(dir: string): RecordingPaths {
    return {
        dir,
        script: path.join(dir, SCRIPT_FILE),
        locations: path.join(dir, LOCATIONS_FILE),
        info: path.join(dir, INFO_FILE),
    }
}

/**
 * Recordings live in `<root>/rec<n>/` with a script, its own locations file
 * and a small metadata file.
 */
export class RecordingStore {
    constructor(
        private fs: FileSystem,
        private rootDir: string,
        private logger: Logger
    ) {}

    paths(id: string): RecordingPaths {
        return pathsIn(path.join(this.rootDir, id))
    }

    async nextId(): Promise<string> {
        const dirs = await this.fs.listDirs(this.rootDir)
        const highest = dirs.reduce((max, dir) => Math.max(max, idNumber(dir) ?? 0), 0)
        return `${ID_PREFIX}${highest + 1}`
    }

    /**
     * Persists a finished session. Returns the new id, or undefined when the
     * session recorded nothing.
     */
    async save(recording: SaveInput, table: LocationTable, now = new Date()): Promise<string | undefined> {
        if (recording.commands.length === 0) {
            this.logger.info('recording:empty')
            return undefined
        }

        const id = await this.nextId()
        const paths = this.paths(id)
        const script = [...recordingHeader(id, recording, now), serializeScript(recording.commands)].join('\n')
        const info: RecordingInfo = {
            id,
            created: now.toISOString(),
            duration: recording.duration,
            commands: recording.commands.length,
            locations: recording.newLocations,
            description: `Recording from ${formatTimestamp(now)}`,
        }

        await this.fs.mkdir(paths.dir)
        await this.fs.writeText(paths.script, `${script}\n`)
        await flushLocations(this.fs, table, paths.locations)
        await this.fs.writeJSON(paths.info, info)
        this.logger.debug({ id, dir: paths.dir }, 'recording:saved')
        return id
    }

    async readInfo(id: string): Promise<RecordingInfo | undefined> {
        const file = this.paths(id).info
        if (!(await this.fs.exists(file))) return undefined
        try {
            const parsed = RecordingInfoSchema.safeParse(await this.fs.readJSON<unknown>(file))
            return parsed.success ? parsed.data : undefined
        } catch (error) {
            this.logger.warn({ id, error: errorMessage(error) }, 'Unreadable recording info')
            return undefined
        }
    }

    async list(): Promise<RecordingSummary[]> {
        const ids = (await this.fs.listDirs(this.rootDir))
            .filter((dir) => idNumber(dir) !== undefined)
            .sort((a, b) => (idNumber(a) ?? 0) - (idNumber(b) ?? 0))

        const summaries: RecordingSummary[] = []
        for (const id of ids) {
            const info = await this.readInfo(id)
            summaries.push({ id, dir: this.paths(id).dir, info })
        }
        return summaries
    }

    /**
     * Maps a recording id or a script path to the files to load. A bare script
     * path uses a `locations.json` beside it when there is one.
     */
    async resolve(idOrPath: string): Promise<{ id?: string; paths: RecordingPaths }> {
        if (ID_PATTERN.test(idOrPath)) {
            const paths = this.paths(idOrPath)
            if (await this.fs.exists(paths.script)) return { id: idOrPath, paths }
        }

        if (await this.fs.exists(idOrPath)) {
            return { paths: { ...pathsIn(path.dirname(idOrPath)), script: idOrPath } }
        }

        throw new FatalError(`Script not found: ${idOrPath}`, {
            hint: 'Run "mimic list" to see the available recordings.',
        })
    }

    async load(idOrPath: string): Promise<LoadedRecording> {
        const { id, paths } = await this.resolve(idOrPath)
        let text: string
        try {
            text = await this.fs.readText(paths.script)
        } catch (error) {
            throw new FatalError(`Cannot read script ${paths.script}: ${errorMessage(error)}`, { cause: error })
        }
        return { id, paths, ...parseScript(text) }
    }

    async loadTable(paths: RecordingPaths, override?: string): Promise<LocationTable> {
        return loadLocations(this.fs, override ?? paths.locations, this.logger)
    }

    /**
     * Writes a remapped copy of a recording into `targetDir`: the script and
     * metadata unchanged, the locations replaced by `table`.
     */
    async saveRemapped(source: RecordingPaths, targetDir: string, table: LocationTable): Promise<RecordingPaths> {
        const target = pathsIn(targetDir)

        await this.fs.mkdir(targetDir)
        await this.fs.writeText(target.script, await this.fs.readText(source.script))
        if (await this.fs.exists(source.info)) {
            await this.fs.writeText(target.info, await this.fs.readText(source.info))
        }
        await flushLocations(this.fs, table, target.locations)
        this.logger.debug({ source: source.dir, targetDir }, 'remap:saved')
        return target
    }
}
