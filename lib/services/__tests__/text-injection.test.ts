/**
 * 文字輸入鏈與剪貼簿備援測試
 */

import { describe, test, expect, vi } from 'vitest'
import { ApplicationContext, TextInjectionChain, TextInjectionStrategy } from '../text-injection-chain'
import { InjectionDispatcher } from '../injection-dispatcher'
import { FakeClipboard, FakeTextInjection } from './fakes'
import { CLIPBOARD_FALLBACK_MESSAGE, INJECTION_FALLBACK_MESSAGE } from '../../error-recovery-policy'
import { DictationErrors } from '../../dictation-errors'
import { silentLogger } from '../../logger'
import { err, ok, Result } from '../../../types/result'
import type { DictationError } from '../../../types/dictation-error'

const TEXT_EDIT: ApplicationContext = { bundleIdentifier: 'com.example.editor', name: 'Editor' }

function strategy(
    methodName: string,
    result: Result<void, DictationError>,
    compatible: (application: ApplicationContext) => boolean = () => true
) {
    return {
        methodName,
        isCompatible: vi.fn(compatible),
        inject: vi.fn(async (_text: string, _application: ApplicationContext) => result)
    } satisfies TextInjectionStrategy
}

describe('TextInjectionChain - 依序嘗試輸入方式', () => {
    test('沒有前景應用程式', async () => {
        const chain = new TextInjectionChain([strategy('keyboard', ok(undefined))], {
            getFocusedApplication: () => null,
            logger: silentLogger
        })

        expect(await chain.inject('hi')).toEqual(err({ kind: 'noFocusedApplication' }))
    })

    test('沒有相容的輸入方式', async () => {
        const chain = new TextInjectionChain([strategy('keyboard', ok(undefined), () => false)], {
            getFocusedApplication: () => TEXT_EDIT,
            logger: silentLogger
        })

        expect(await chain.inject('hi')).toEqual(err({ kind: 'unsupportedApplication', appName: 'Editor' }))
    })

    test('第一個成功的方式即回報，後面的不再嘗試', async () => {
        const accessibility = strategy('accessibility', ok(undefined))
        const keyboard = strategy('keyboard', ok(undefined))
        const chain = new TextInjectionChain([accessibility, keyboard], {
            getFocusedApplication: () => TEXT_EDIT,
            logger: silentLogger
        })

        expect(await chain.inject('hi')).toEqual(ok({ method: 'accessibility', fallbackUsed: false }))
        expect(accessibility.inject).toHaveBeenCalledWith('hi', TEXT_EDIT)
        expect(keyboard.inject).not.toHaveBeenCalled()
    })

    test('前面的方式失敗或拋出例外時改用下一個', async () => {
        const accessibility = strategy('accessibility', err(DictationErrors.injectionFailed('no element')))
        const pasteboard: TextInjectionStrategy = {
            methodName: 'pasteboard',
            isCompatible: () => true,
            inject: async () => {
                throw new Error('paste crashed')
            }
        }
        const keyboard = strategy('keyboard', ok(undefined))
        const chain = new TextInjectionChain([accessibility, pasteboard, keyboard], {
            getFocusedApplication: () => TEXT_EDIT,
            logger: silentLogger
        })

        expect(await chain.inject('hi')).toEqual(ok({ method: 'keyboard', fallbackUsed: true }))
    })

    test('全部失敗', async () => {
        const chain = new TextInjectionChain([strategy('keyboard', err(DictationErrors.injectionFailed('blocked')))], {
            getFocusedApplication: () => TEXT_EDIT,
            logger: silentLogger
        })

        expect(await chain.inject('hi')).toEqual(err({ kind: 'injectionFailed', reason: 'All injection methods failed' }))
    })

    test('依應用程式偏好調整順序，其餘維持原順序', () => {
        const chain = new TextInjectionChain(
            [
                strategy('accessibility', ok(undefined)),
                strategy('pasteboard', ok(undefined)),
                strategy('keyboard', ok(undefined))
            ],
            {
                getFocusedApplication: () => TEXT_EDIT,
                preferredMethods: { 'com.example.terminal': ['keyboard'] },
                logger: silentLogger
            }
        )

        const terminal = { bundleIdentifier: 'com.example.terminal', name: 'Terminal' }
        expect(chain.orderFor(terminal).map(s => s.methodName)).toEqual(['keyboard', 'accessibility', 'pasteboard'])
        expect(chain.orderFor(TEXT_EDIT).map(s => s.methodName)).toEqual(['accessibility', 'pasteboard', 'keyboard'])
    })
})

describe('InjectionDispatcher - 剪貼簿備援', () => {
    const setup = () => {
        const injection = new FakeTextInjection()
        const clipboard = new FakeClipboard()
        const dispatcher = new InjectionDispatcher(() => injection, () => clipboard, silentLogger)
        return { injection, clipboard, dispatcher }
    }

    test('輸入成功', async () => {
        const { dispatcher, clipboard } = setup()

        expect(await dispatcher.dispatch('hello')).toEqual({ kind: 'injected', method: 'accessibility', fallbackUsed: false })
        expect(clipboard.writeText).not.toHaveBeenCalled()
    })

    test('非致命錯誤複製到剪貼簿並提示貼上', async () => {
        const { dispatcher, injection, clipboard } = setup()
        injection.result = err(DictationErrors.unsupportedApplication('Terminal'))

        expect(await dispatcher.dispatch('hello')).toEqual({
            kind: 'clipboard',
            reason: { kind: 'unsupportedApplication', appName: 'Terminal' },
            message: CLIPBOARD_FALLBACK_MESSAGE
        })
        expect(clipboard.text).toBe('hello')
    })

    test('輸入服務拋出例外時同樣複製到剪貼簿', async () => {
        const { dispatcher, injection } = setup()
        injection.inject.mockRejectedValueOnce(new Error('bridge down'))

        expect(await dispatcher.dispatch('hello')).toEqual({
            kind: 'clipboard',
            reason: { kind: 'unknown', detail: 'bridge down' },
            message: INJECTION_FALLBACK_MESSAGE
        })
    })

    test('剪貼簿失敗', async () => {
        const { dispatcher, injection, clipboard } = setup()
        injection.result = err(DictationErrors.noFocusedApplication())
        clipboard.fail = true

        expect(await dispatcher.dispatch('hello')).toEqual({
            kind: 'failed',
            reason: { kind: 'noFocusedApplication' },
            error: { kind: 'clipboardOperationFailed' }
        })
    })
})
