import type { EventMap, TypedEventEmitter } from '../core/events.js'
import { serializeCommand } from '../script/serializer.js'
import { colors, formatPoint } from './ui.js'

type Writer = (line: string) => void

export interface ProgressReporter {
    dispose(): void
}

function firstLine(text: string): string {
    const [head = '', ...rest] = text.split('\n')
    return rest.length > 0 ? `${head} ...` : head
}

/** Prints recording, playback and remap progress from the event bus. */
export function createProgressReporter(eventBus: TypedEventEmitter, write: Writer = console.log): ProgressReporter {
    const onRecordingStart = () => {
        write(colors.success('Recording started. Click the trigger button again to stop.'))
    }

    const onRecordingCommand = (data: EventMap['recording:command']) => {
        write(`${colors.dim(`[${data.elapsed.toFixed(1)}s]`)} ${colors.command(firstLine(serializeCommand(data.command)))}`)
    }

    const onRecordingLocation = (data: EventMap['recording:location']) => {
        write(`${colors.dim('new location')} ${colors.location(data.name)} ${formatPoint(data.point)}`)
    }

    const onRecordingStop = (data: EventMap['recording:stop']) => {
        write(
            colors.success(
                `Recording stopped: ${data.commands} commands, ${data.newLocations} new locations, ${data.duration.toFixed(1)}s`
            )
        )
    }

    const onPlaybackCommand = (data: EventMap['playback:command']) => {
        write(`${colors.dim(`${data.index + 1}.`)} ${firstLine(serializeCommand(data.command))}`)
    }

    const onPlaybackSkip = (data: EventMap['playback:skip']) => {
        write(colors.warn(`   skipped: ${data.reason}`))
    }

    const onPlaybackComplete = (data: EventMap['playback:complete']) => {
        const status = data.aborted ? colors.warn('Playback cancelled') : colors.success('Playback complete')
        write(`${status}: ${data.executed} executed, ${data.skipped} skipped`)
    }

    const onRemapTarget = (data: EventMap['remap:target']) => {
        write(
            `[${data.index + 1}/${data.total}] ${colors.location(data.name)} was at ${formatPoint(data.original)}. ` +
                colors.dim('Left click the new position, or press the trigger to keep it.')
        )
    }

    const onRemapResolved = (data: EventMap['remap:resolved']) => {
        if (!data.kept) {
            write(colors.success(`   ${data.name} -> ${formatPoint(data.point)}`))
        } else if (data.point) {
            write(colors.dim(`   ${data.name} kept at ${formatPoint(data.point)}`))
        } else {
            write(colors.warn(`   ${data.name} has no position and was left out`))
        }
    }

    eventBus.on('recording:start', onRecordingStart)
    eventBus.on('recording:command', onRecordingCommand)
    eventBus.on('recording:location', onRecordingLocation)
    eventBus.on('recording:stop', onRecordingStop)
    eventBus.on('playback:command', onPlaybackCommand)
    eventBus.on('playback:skip', onPlaybackSkip)
    eventBus.on('playback:complete', onPlaybackComplete)
    eventBus.on('remap:target', onRemapTarget)
    eventBus.on('remap:resolved', onRemapResolved)

    return {
        dispose() {
            eventBus.off('recording:start', onRecordingStart)
            eventBus.off('recording:command', onRecordingCommand)
            eventBus.off('recording:location', onRecordingLocation)
            eventBus.off('recording:stop', onRecordingStop)
            eventBus.off('playback:command', onPlaybackCommand)
            eventBus.off('playback:skip', onPlaybackSkip)
            eventBus.off('playback:complete', onPlaybackComplete)
            eventBus.off('remap:target', onRemapTarget)
            eventBus.off('remap:resolved', onRemapResolved)
        },
    }
}
