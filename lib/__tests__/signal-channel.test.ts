import { describe, test, expect, vi } from 'vitest'
import { TypedEmitter } from '../typed-emitter'
import { SignalChannel } from '../signal-channel'

type Events = {
  level: number
  device: { name: string }
}

describe('TypedEmitter', () => {
  test('on / off / emit', () => {
    const emitter = new TypedEmitter<Events>()
    const listener = vi.fn()

    emitter.on('level', listener)
    expect(emitter.emit('level', 0.3)).toBe(true)
    emitter.off('level', listener)
    expect(emitter.emit('level', 0.6)).toBe(false)

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith(0.3)
  })

  test('once 只觸發一次', () => {
    const emitter = new TypedEmitter<Events>()
    const listener = vi.fn()

    emitter.once('device', listener)
    emitter.emit('device', { name: 'USB Microphone' })
    emitter.emit('device', { name: 'Built-in Microphone' })

    expect(listener).toHaveBeenCalledTimes(1)
    expect(emitter.listenerCount('device')).toBe(0)
  })

  test('監聽器拋出例外不影響其他監聽器', () => {
    const emitter = new TypedEmitter<Events>()
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const listener = vi.fn()

    emitter.on('level', () => {
      throw new Error('boom')
    })
    emitter.on('level', listener)
    emitter.emit('level', 1)

    expect(listener).toHaveBeenCalledWith(1)
    expect(consoleError).toHaveBeenCalledTimes(1)
    consoleError.mockRestore()
  })

  test('removeAllListeners', () => {
    const emitter = new TypedEmitter<Events>()
    emitter.on('level', vi.fn())
    emitter.on('device', vi.fn())

    emitter.removeAllListeners('level')
    expect(emitter.listenerCount('level')).toBe(0)
    expect(emitter.listenerCount('device')).toBe(1)

    emitter.removeAllListeners()
    expect(emitter.listenerCount('device')).toBe(0)
  })
})

describe('SignalChannel', () => {
  test('subscribe 回傳取消訂閱函數', () => {
    const channel = new SignalChannel<number>()
    const received: number[] = []

    const unsubscribe = channel.subscribe(value => received.push(value))
    channel.publish(1)
    unsubscribe()
    channel.publish(2)

    expect(received).toEqual([1])
    expect(channel.subscriberCount).toBe(0)
  })

  test('close 移除所有訂閱', () => {
    const channel = new SignalChannel<string>()
    channel.subscribe(vi.fn())
    channel.subscribe(vi.fn())

    expect(channel.subscriberCount).toBe(2)
    channel.close()
    expect(channel.subscriberCount).toBe(0)
  })
})
