import type { RecordingState, RecordingStateKind } from './recording-state'

// 狀態轉換規則
export interface StateTransitionRule {
    currentState: RecordingStateKind
    targetState: RecordingStateKind
    description: string
}

// 狀態轉換結果
export interface StateTransitionResult {
    success: boolean
    previousState: RecordingState
    newState: RecordingState
    error?: string
}

// 合法的狀態轉換，其餘一律拒絕
export const STATE_TRANSITION_RULES: readonly StateTransitionRule[] = [
    { currentState: 'idle', targetState: 'recording', description: '開始錄音' },

    { currentState: 'recording', targetState: 'processing', description: '停止錄音，開始轉錄' },
    { currentState: 'recording', targetState: 'idle', description: '錄音啟動前被取消' },
    { currentState: 'recording', targetState: 'error', description: '錄音失敗' },

    { currentState: 'processing', targetState: 'success', description: '轉錄並輸出文字完成' },
    { currentState: 'processing', targetState: 'error', description: '轉錄或輸出失敗' },

    { currentState: 'success', targetState: 'idle', description: '成功提示結束' },
    { currentState: 'success', targetState: 'recording', description: '成功提示期間重新開始錄音' },

    { currentState: 'error', targetState: 'idle', description: '錯誤自動恢復' },
    { currentState: 'error', targetState: 'recording', description: '錯誤後重新開始錄音' },
] as const
