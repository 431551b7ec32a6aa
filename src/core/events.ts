import type { Command } from '../script/types.js'
import type { Point } from './types.js'

export type EventMap = {
    'recording:start': { startedAt: number }
    'recording:stop': { commands: number; newLocations: number; duration: number }
    'recording:command': { command: Command; elapsed: number }
    'recording:location': { name: string; point: Point; elapsed: number }
    'playback:command': { index: number; command: Command }
    'playback:skip': { index: number; command: Command; reason: string }
    'playback:complete': { executed: number; skipped: number; aborted: boolean }
    'remap:target': { name: string; original: Point | undefined; index: number; total: number }
    'remap:resolved': { name: string; point: Point | undefined; kept: boolean }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // progress listeners must not break the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
