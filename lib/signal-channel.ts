import { TypedEmitter } from './typed-emitter'

export type Unsubscribe = () => void

/**
 * 協作者對外公開的訊號序列（錄音狀態、音量、裝置變更⋯）
 */
export interface Subscribable<T> {
    subscribe(listener: (value: T) => void): Unsubscribe
}

/**
 * 以 TypedEmitter 實作的可訂閱序列，供協作者實作使用
 */
export class SignalChannel<T> implements Subscribable<T> {
    private readonly emitter = new TypedEmitter<{ value: T }>()

    subscribe(listener: (value: T) => void): Unsubscribe {
        this.emitter.on('value', listener)
        return () => {
            this.emitter.off('value', listener)
        }
    }

    publish(value: T): void {
        this.emitter.emit('value', value)
    }

    get subscriberCount(): number {
        return this.emitter.listenerCount('value')
    }

    close(): void {
        this.emitter.removeAllListeners()
    }
}
