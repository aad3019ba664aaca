import type { ServiceLogger } from './logger'
import { RecordingState, RecordingStateKind, RecordingStates, RECORDING_STATE_KINDS } from '../types/recording-state'
import { STATE_TRANSITION_RULES, StateTransitionResult, StateTransitionRule } from '../types/state-transitions'

/**
 * 檢查狀態轉換是否在規則表中
 */
export function isValidStateTransition(from: RecordingStateKind, to: RecordingStateKind): boolean {
    return STATE_TRANSITION_RULES.some(rule => rule.currentState === from && rule.targetState === to)
}

export function findTransitionRule(from: RecordingStateKind, to: RecordingStateKind): StateTransitionRule | undefined {
    return STATE_TRANSITION_RULES.find(rule => rule.currentState === from && rule.targetState === to)
}

// 狀態機類別
export class StateMachine {
    private currentState: RecordingState = RecordingStates.idle()
    private version = 0

    constructor(private readonly logger: ServiceLogger = console) {}

    // 嘗試狀態轉換，不合法時不改變狀態也不拋出例外
    transition(target: RecordingState): StateTransitionResult {
        const previousState = this.currentState
        const transitionKey = `${previousState.kind}->${target.kind}`
        const rule = findTransitionRule(previousState.kind, target.kind)

        if (!rule) {
            const error = `不合法的狀態轉換: ${transitionKey}`
            this.logger.warn(`⚠️ [StateMachine] ${error}`)
            return {
                success: false,
                previousState,
                newState: previousState,
                error
            }
        }

        this.currentState = target
        this.version++
        this.logger.log(`✅ [StateMachine] 狀態轉換成功: ${transitionKey} (${rule.description})`)

        return {
            success: true,
            previousState,
            newState: target
        }
    }

    // 取得當前狀態
    getCurrentState(): RecordingState {
        return this.currentState
    }

    // 每次成功轉換遞增，計時器用來判斷是否已被較新的轉換取代
    getVersion(): number {
        return this.version
    }

    // 檢查是否可以轉換到指定狀態
    canTransition(target: RecordingStateKind): boolean {
        return isValidStateTransition(this.currentState.kind, target)
    }

    // 取得可用的轉換
    getAvailableTransitions(): RecordingStateKind[] {
        return RECORDING_STATE_KINDS.filter(kind => this.canTransition(kind))
    }

    // 重置狀態機
    reset(): void {
        this.currentState = RecordingStates.idle()
        this.version++
        this.logger.log('🔄 [StateMachine] 狀態機已重置')
    }
}
