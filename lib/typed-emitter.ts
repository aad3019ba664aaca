/* ============================================================
 * 輕量型別安全 EventEmitter（無 Node polyfill）
 * ============================================================
 */
export type Listener<T> = (payload: T) => void

export class TypedEmitter<Events extends Record<string, unknown>> {
  private listeners: {
    [K in keyof Events]?: Set<Listener<Events[K]>>
  } = {}

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    (this.listeners[event] ??= new Set()).add(listener)
    return this
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    this.listeners[event]?.delete(listener)
    return this
  }

  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): this {
    const wrapper: Listener<Events[K]> = (payload) => {
      this.off(event, wrapper)
      listener(payload)
    }
    return this.on(event, wrapper)
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): boolean {
    const listeners = this.listeners[event]
    if (!listeners?.size) return false
    // 複製一份，避免監聽器在回呼中 off 自己
    Array.from(listeners).forEach((l) => {
      try {
        l(payload)
      } catch (error) {
        console.error(`🔔 [TypedEmitter] "${String(event)}" 監聽器執行失敗:`, error)
      }
    })
    return true
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0
  }

  removeAllListeners<K extends keyof Events>(event?: K): this {
    if (event) this.listeners[event]?.clear()
    else Object.values(this.listeners).forEach((s) => s?.clear())
    return this
  }
}
