import type { ServiceLogger } from '../logger'

/**
 * BaseService - 長駐服務的共用生命週期
 *
 * 子類只實作 initialize / cleanup，start / stop 負責狀態旗標、日誌與失敗回滾。
 * 日誌一律經由建構時注入的 logger，方便測試靜音。
 */
export abstract class BaseService {
    protected readonly logger: ServiceLogger

    // 日誌前綴，例如 [DictationOrchestrator]
    protected abstract readonly serviceName: string

    private _isInitialized = false

    private _isRunning = false

    private startedAt: number | null = null

    private lastError: string | null = null

    constructor(logger: ServiceLogger = console) {
        this.logger = logger
    }

    abstract initialize(): Promise<void>

    /**
     * 釋放 initialize 取得的資源；初始化失敗時也會被呼叫，須容許部分初始化的狀態
     */
    abstract cleanup(): Promise<void>

    /**
     * 初始化 → 標記運行中；初始化失敗時先 cleanup 再拋出原始錯誤
     */
    async start(): Promise<void> {
        if (this._isRunning) {
            this.logger.warn(`🔄 [${this.serviceName}] 已在運行中，略過啟動`)
            return
        }

        this.logger.log(`🚀 [${this.serviceName}] 啟動中...`)

        if (!this._isInitialized) {
            try {
                await this.initialize()
            } catch (error) {
                this.logger.error(`❌ [${this.serviceName}] 啟動失敗，回滾已取得的資源:`, error)
                await this.rollbackStart()
                throw error
            }
            this._isInitialized = true
        }

        this._isRunning = true
        this.startedAt = Date.now()
        this.lastError = null
        this.logger.log(`✅ [${this.serviceName}] 已啟動`)
    }

    /**
     * cleanup 後重設旗標，之後再 start 會重新 initialize
     */
    async stop(): Promise<void> {
        if (!this._isRunning) {
            this.logger.warn(`🔄 [${this.serviceName}] 未在運行中，略過停止`)
            return
        }

        this.logger.log(`🛑 [${this.serviceName}] 停止中...`)
        try {
            await this.cleanup()
        } catch (error) {
            this.logger.error(`❌ [${this.serviceName}] 停止失敗:`, error)
            throw error
        }

        this._isRunning = false
        this._isInitialized = false
        this.startedAt = null
        this.logger.log(`✅ [${this.serviceName}] 已停止`)
    }

    get isInitialized(): boolean {
        return this._isInitialized
    }

    get isRunning(): boolean {
        return this._isRunning
    }

    getStatus(): ServiceStatus {
        return {
            serviceName: this.serviceName,
            isInitialized: this._isInitialized,
            isRunning: this._isRunning,
            startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
            lastError: this.lastError,
            timestamp: new Date().toISOString()
        }
    }

    /**
     * 記錄並包成 ServiceError 拋出，訊息同時保留在狀態摘要中
     */
    protected handleError(operation: string, error: unknown): never {
        const reason = error instanceof Error ? error.message : String(error)
        const message = `${this.serviceName} ${operation} 失敗: ${reason}`

        this.lastError = message
        this.logger.error(`❌ [${this.serviceName}] ${operation} 失敗:`, error)

        throw new ServiceError(message, {
            serviceName: this.serviceName,
            operation,
            originalError: error,
            timestamp: new Date().toISOString()
        })
    }

    protected logSuccess(operation: string, details?: unknown): void {
        this.logger.log(`✅ [${this.serviceName}] ${operation} 成功`, details ?? '')
    }

    protected logInfo(message: string, details?: unknown): void {
        this.logger.log(`ℹ️ [${this.serviceName}] ${message}`, details ?? '')
    }

    protected logWarning(message: string, details?: unknown): void {
        this.logger.warn(`⚠️ [${this.serviceName}] ${message}`, details ?? '')
    }

    private async rollbackStart(): Promise<void> {
        try {
            await this.cleanup()
        } catch (cleanupError) {
            this.logger.error(`❌ [${this.serviceName}] 回滾失敗:`, cleanupError)
        }
    }
}

export interface ServiceStatus {
    serviceName: string
    isInitialized: boolean
    isRunning: boolean
    startedAt: string | null
    // 最近一次 handleError 的訊息，成功啟動後清除
    lastError: string | null
    timestamp: string
}

/**
 * 服務層錯誤，保留原始錯誤與發生的操作
 */
export class ServiceError extends Error {
    readonly serviceName: string
    readonly operation: string
    readonly originalError: unknown
    readonly timestamp: string

    constructor(message: string, context: {
        serviceName: string
        operation: string
        originalError: unknown
        timestamp: string
    }) {
        super(message)
        this.name = 'ServiceError'
        this.serviceName = context.serviceName
        this.operation = context.operation
        this.originalError = context.originalError
        this.timestamp = context.timestamp
    }
}
