import { describe, test, expect, vi } from 'vitest'
import { createDictationStore, dictationSelectors, initialDictationState } from '../dictation-store'
import { RecordingStates } from '../../types/recording-state'

describe('DictationStore - 可觀察狀態', () => {
    test('初始狀態', () => {
        const store = createDictationStore({ selectedModelId: 'openai_whisper-tiny' })

        expect(store.getState()).toEqual({ ...initialDictationState, selectedModelId: 'openai_whisper-tiny' })
    })

    test('依欄位訂閱，只在該欄位變化時通知', () => {
        const store = createDictationStore()
        const listener = vi.fn()
        const unsubscribe = store.subscribe(state => state.audioLevel, listener)

        store.setState({ errorMessage: 'ignored' })
        store.setState({ audioLevel: 0.5 })
        unsubscribe()
        store.setState({ audioLevel: 0.8 })

        expect(listener).toHaveBeenCalledTimes(1)
        expect(listener).toHaveBeenCalledWith(0.5, 0)
    })

    test('selectors', () => {
        const state = { ...initialDictationState, errorMessage: 'Text copied to clipboard. Press Cmd+V to paste.' }

        expect(dictationSelectors.isBusy({ ...state, recordingState: RecordingStates.processing() })).toBe(true)
        expect(dictationSelectors.isBusy(state)).toBe(false)
        expect(dictationSelectors.canStart({ ...state, recordingState: RecordingStates.success() })).toBe(true)
        expect(dictationSelectors.canStart({ ...state, recordingState: RecordingStates.recording() })).toBe(false)
        expect(dictationSelectors.errorText(state)).toBe('Text copied to clipboard. Press Cmd+V to paste.')
        expect(dictationSelectors.errorText({ ...state, recordingState: RecordingStates.error('No model loaded') }))
            .toBe('No model loaded')
    })
})
