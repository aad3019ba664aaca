import { DictationErrors, describeDictationError, settle } from '../dictation-errors'
import type { ServiceLogger } from '../logger'
import type { DictationError } from '../../types/dictation-error'
import { err, ok, Result } from '../../types/result'
import type { ITextInjectionService, InjectionSuccess } from './interfaces'

/**
 * 前景應用程式資訊
 */
export interface ApplicationContext {
    bundleIdentifier: string | null
    name: string
}

/**
 * 單一輸入方式（鍵盤模擬、無障礙 API、剪貼簿貼上⋯）
 */
export interface TextInjectionStrategy {
    readonly methodName: string
    isCompatible(application: ApplicationContext): boolean
    inject(text: string, application: ApplicationContext): Promise<Result<void, DictationError>>
}

export interface TextInjectionChainOptions {
    getFocusedApplication: () => ApplicationContext | null
    /**
     * bundleIdentifier → 優先嘗試的 methodName 清單
     */
    preferredMethods?: Record<string, readonly string[]>
    logger?: ServiceLogger
}

/**
 * 依序嘗試各輸入方式，第一個成功的就回報
 */
export class TextInjectionChain implements ITextInjectionService {
    private readonly logger: ServiceLogger

    constructor(
        private readonly strategies: readonly TextInjectionStrategy[],
        private readonly options: TextInjectionChainOptions
    ) {
        this.logger = options.logger ?? console
    }

    async inject(text: string): Promise<Result<InjectionSuccess, DictationError>> {
        const application = this.options.getFocusedApplication()
        if (!application) {
            return err(DictationErrors.noFocusedApplication())
        }

        const candidates = this.orderFor(application).filter(strategy => strategy.isCompatible(application))
        if (candidates.length === 0) {
            return err(DictationErrors.unsupportedApplication(application.name))
        }

        for (const [index, strategy] of candidates.entries()) {
            const result = await settle(() => strategy.inject(text, application))
            if (result.ok) {
                this.logger.log(`✅ [TextInjectionChain] ${strategy.methodName} 輸入成功 → ${application.name}`)
                return ok({ method: strategy.methodName, fallbackUsed: index > 0 })
            }
            this.logger.warn(`⚠️ [TextInjectionChain] ${strategy.methodName} 失敗: ${describeDictationError(result.error)}`)
        }

        return err(DictationErrors.injectionFailed('All injection methods failed'))
    }

    /**
     * 該應用程式偏好的方式排前面，其餘維持原順序
     */
    orderFor(application: ApplicationContext): TextInjectionStrategy[] {
        const preferred = application.bundleIdentifier
            ? this.options.preferredMethods?.[application.bundleIdentifier] ?? []
            : []

        const rank = (strategy: TextInjectionStrategy) => {
            const position = preferred.indexOf(strategy.methodName)
            return position === -1 ? preferred.length : position
        }

        return [...this.strategies].sort((a, b) => rank(a) - rank(b))
    }
}
