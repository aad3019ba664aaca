/**
 * 錯誤復原：自動回到 idle、模型退回上限
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest'
import { createHarness, flushMicrotasks, Harness, LARGE_MODEL, TINY_MODEL } from './fakes'
import type { RecoveryAction } from '../../error-recovery-policy'

describe('DictationOrchestrator - 錯誤自動恢復', () => {
    let h: Harness

    beforeEach(async () => {
        vi.useFakeTimers()
        h = createHarness()
        await h.start()
    })

    afterEach(async () => {
        await h.stop()
        vi.useRealTimers()
    })

    test('error 狀態 5 秒後回到 idle', async () => {
        h.audio.permission = 'denied'
        await h.orchestrator.startDictation()
        expect(h.orchestrator.getRecordingState().kind).toBe('error')

        await vi.advanceTimersByTimeAsync(4999)
        expect(h.orchestrator.getRecordingState().kind).toBe('error')

        await vi.advanceTimersByTimeAsync(1)
        await flushMicrotasks()
        expect(h.orchestrator.getRecordingState().kind).toBe('idle')
        expect(h.orchestrator.getSessionSnapshot()).toBeNull()
    })

    test('期間重新開始錄音會取消自動恢復', async () => {
        h.audio.permission = 'denied'
        await h.orchestrator.startDictation()

        await vi.advanceTimersByTimeAsync(3000)
        h.audio.permission = 'granted'
        expect(await h.orchestrator.startDictation()).toBe(true)

        await vi.advanceTimersByTimeAsync(2500)
        await flushMicrotasks()
        expect(h.orchestrator.getRecordingState().kind).toBe('recording')
        expect(h.orchestrator.getSessionSnapshot()?.id).toBe(2)
    })

    test('錯誤訊息與可用轉換', async () => {
        h.audio.permission = 'denied'
        await h.orchestrator.startDictation()

        expect(h.orchestrator.getStateSummary()).toBe('Error: Microphone permission required')
        expect(h.orchestrator.getAvailableTransitions()).toEqual(['idle', 'recording'])
        expect(h.orchestrator.getSessionSnapshot()?.recoveryAttempts).toBe(1)
    })
})

describe('DictationOrchestrator - 模型退回上限', () => {
    let h: Harness

    beforeEach(async () => {
        vi.useFakeTimers()
        h = createHarness()
        await h.start()
        h.transcription.failingModels.add(LARGE_MODEL)
    })

    afterEach(async () => {
        await h.stop()
        vi.useRealTimers()
    })

    test('連續失敗時最多退回預設模型兩次，第三次停止', async () => {
        const actions: RecoveryAction[] = []
        h.orchestrator.events.on('recovery', ({ action }) => actions.push(action))

        await h.orchestrator.changeModel(LARGE_MODEL)
        await h.orchestrator.changeModel(LARGE_MODEL)
        await h.orchestrator.changeModel(LARGE_MODEL)

        expect(actions).toEqual([
            { type: 'fallbackModel', modelId: TINY_MODEL },
            { type: 'fallbackModel', modelId: TINY_MODEL },
            { type: 'none' }
        ])
        expect(h.transcription.loadModel.mock.calls.filter(([id]) => id === TINY_MODEL)).toHaveLength(3)
        expect(h.orchestrator.getState().selectedModelId).toBe(LARGE_MODEL)
        expect(h.orchestrator.getState().errorMessage).toBe(
            "Failed to load 'openai_whisper-large-v3' model: corrupted weights"
        )
    })

    test('idle 時模型錯誤只更新訊息，不進入 error 狀態', async () => {
        await h.orchestrator.changeModel(LARGE_MODEL)

        expect(h.orchestrator.getRecordingState().kind).toBe('idle')
        expect(h.orchestrator.getState().selectedModelId).toBe(TINY_MODEL)
        expect(h.orchestrator.getState().errorMessage).toBeNull()
    })

    test('開始新的錄音會重設嘗試次數', async () => {
        await h.orchestrator.changeModel(LARGE_MODEL)
        await h.orchestrator.changeModel(LARGE_MODEL)

        await h.orchestrator.startDictation()

        expect(h.orchestrator.getSessionSnapshot()?.recoveryAttempts).toBe(0)
    })
})
