import type { Point, PoseState } from "@deskpet/shared"

/**
 * Everything the core announces to its host (tray, overlay windows, tests).
 */
export interface PetEvents {
  "pose:changed": { readonly from: PoseState; readonly to: PoseState }
  "window:moved": Point
  "bubble:shown": { readonly title: string; readonly message: string; readonly durationMs: number }
  "bubble:closed": Record<string, never>
  /** Mirror of every notification, for a tray balloon */
  notify: { readonly title: string; readonly message: string }
  "menu:open": Point
  "roundtrip:started": { readonly direction: -1 | 1 }
  "roundtrip:finished": Record<string, never>
  quit: Record<string, never>
}

export type PetEventName = keyof PetEvents

type EventCallback<K extends PetEventName> = (payload: PetEvents[K]) => void

type ListenerMap = {
  [K in PetEventName]?: EventCallback<K>[]
}

export class PetEventBus {
  private readonly listeners: ListenerMap = {}

  on<K extends PetEventName>(event: K, callback: EventCallback<K>): this {
    const listeners: { [P in K]?: EventCallback<P>[] } = this.listeners
    const list: EventCallback<K>[] = listeners[event] ?? []
    list.push(callback)
    listeners[event] = list
    return this
  }

  off<K extends PetEventName>(event: K, callback: EventCallback<K>): this {
    const listeners: { [P in K]?: EventCallback<P>[] } = this.listeners
    const list: EventCallback<K>[] | undefined = listeners[event]
    if (list) {
      listeners[event] = list.filter((cb) => cb !== callback)
    }
    return this
  }

  emit<K extends PetEventName>(event: K, payload: PetEvents[K]): this {
    const list: EventCallback<K>[] | undefined = this.listeners[event]
    if (list) {
      for (const cb of [...list]) cb(payload)
    }
    return this
  }
}
