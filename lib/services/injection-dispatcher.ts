import { CLIPBOARD_FALLBACK_MESSAGE, INJECTION_FALLBACK_MESSAGE } from '../error-recovery-policy'
import { describeDictationError, isNonFatalInjectionError, settle } from '../dictation-errors'
import type { ServiceLogger } from '../logger'
import type { DictationError } from '../../types/dictation-error'
import type { IClipboardService, ITextInjectionService } from './interfaces'

export type InjectionOutcome =
    | { kind: 'injected'; method: string; fallbackUsed: boolean }
    // 輸入失敗但已複製到剪貼簿，流程仍視為成功
    | { kind: 'clipboard'; reason: DictationError; message: string }
    | { kind: 'failed'; reason: DictationError; error: DictationError }

/**
 * 把轉錄文字送進前景應用程式，失敗時改放剪貼簿
 */
export class InjectionDispatcher {
    constructor(
        private readonly resolveInjection: () => ITextInjectionService,
        private readonly resolveClipboard: () => IClipboardService,
        private readonly logger: ServiceLogger = console
    ) {}

    async dispatch(text: string): Promise<InjectionOutcome> {
        const result = await settle(() => this.resolveInjection().inject(text))

        if (result.ok) {
            this.logger.log(`✅ [InjectionDispatcher] 文字輸入成功 (${result.value.method})`)
            return { kind: 'injected', method: result.value.method, fallbackUsed: result.value.fallbackUsed }
        }

        this.logger.warn(`⚠️ [InjectionDispatcher] 文字輸入失敗，改用剪貼簿: ${describeDictationError(result.error)}`)
        return this.copyToClipboard(text, result.error)
    }

    async copyToClipboard(text: string, reason: DictationError): Promise<InjectionOutcome> {
        const copied = await settle(() => this.resolveClipboard().writeText(text))

        if (!copied.ok) {
            this.logger.error('❌ [InjectionDispatcher] 剪貼簿寫入失敗:', copied.error)
            return { kind: 'failed', reason, error: copied.error }
        }

        const message = isNonFatalInjectionError(reason) ? CLIPBOARD_FALLBACK_MESSAGE : INJECTION_FALLBACK_MESSAGE
        return { kind: 'clipboard', reason, message }
    }
}
