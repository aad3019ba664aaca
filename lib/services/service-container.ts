import { BaseService, ServiceStatus } from './base-service'
import type { ServiceLogger } from '../logger'

type Providers<M> = { [K in keyof M]?: () => M[K] }
type Instances<M> = { [K in keyof M]?: M[K] }

/**
 * ServiceContainer - 服務依賴注入容器
 *
 * 由組裝端明確建立並傳入，不提供全域實例。
 * 型別參數 M 為「服務鍵 → 服務介面」對照表。
 */
export class ServiceContainer<M extends object> {
    private readonly providers: Providers<M> = {}

    private readonly singletons: Instances<M> = {}

    private readonly singletonKeys = new Set<keyof M>()

    constructor(private readonly logger: ServiceLogger = console) {}

    /**
     * 註冊服務工廠函數，每次 resolve 都會建立新實例
     */
    register<K extends keyof M>(key: K, factory: () => M[K]): void {
        if (this.providers[key]) {
            this.logger.warn(`⚠️ [ServiceContainer] 服務 "${String(key)}" 已存在，將被覆蓋`)
            delete this.singletons[key]
            this.singletonKeys.delete(key)
        }

        this.providers[key] = factory
        this.logger.log(`✅ [ServiceContainer] 服務 "${String(key)}" 註冊成功`)
    }

    /**
     * 註冊單例服務，只會被創建一次
     */
    registerSingleton<K extends keyof M>(key: K, factory: () => M[K]): void {
        this.register(key, factory)
        this.singletonKeys.add(key)
    }

    /**
     * 解析服務實例
     * @throws ServiceContainerError 服務未註冊或建立失敗
     */
    resolve<K extends keyof M>(key: K): M[K] {
        const cached = this.singletons[key]
        if (cached !== undefined) {
            return cached
        }

        const provider = this.providers[key]
        if (!provider) {
            const message = `服務 "${String(key)}" 未註冊`
            this.logger.error(`❌ [ServiceContainer] ${message}`)
            throw new ServiceContainerError(message, 'UNREGISTERED_SERVICE', String(key))
        }

        let instance: M[K]
        try {
            instance = provider()
        } catch (error) {
            this.logger.error(`❌ [ServiceContainer] 創建服務 "${String(key)}" 失敗:`, error)
            throw new ServiceContainerError(`創建服務 "${String(key)}" 失敗`, 'CREATION_FAILED', String(key), error)
        }

        if (this.singletonKeys.has(key)) {
            this.singletons[key] = instance
        }

        return instance
    }

    isRegistered(key: keyof M): boolean {
        return this.providers[key] !== undefined
    }

    getRegisteredServices(): string[] {
        return Object.keys(this.providers)
    }

    /**
     * 丟棄單例快取，下次 resolve 時用同一個工廠重新建立
     * 舊實例若為運行中的 BaseService，先停止它並立即啟動新的實例
     */
    async rebuild<K extends keyof M>(key: K): Promise<void> {
        const previous: unknown = this.singletons[key]
        delete this.singletons[key]

        if (!(previous instanceof BaseService && previous.isRunning)) {
            this.logger.log(`🔁 [ServiceContainer] 服務 "${String(key)}" 將重新建立`)
            return
        }

        await previous.stop()
        const next: unknown = this.resolve(key)
        if (next instanceof BaseService) {
            await next.start()
        }
        this.logger.log(`🔁 [ServiceContainer] 服務 "${String(key)}" 已重新建立並啟動`)
    }

    unregister(key: keyof M): boolean {
        const hasProvider = this.providers[key] !== undefined
        delete this.providers[key]
        delete this.singletons[key]
        this.singletonKeys.delete(key)

        if (hasProvider) {
            this.logger.log(`🗑️ [ServiceContainer] 服務 "${String(key)}" 已清除`)
        }

        return hasProvider
    }

    clear(): void {
        const keys = this.registeredKeys()
        keys.forEach(key => this.unregister(key))
        this.logger.log(`🗑️ [ServiceContainer] 已清除 ${keys.length} 個服務`)
    }

    getContainerStatus(): ServiceContainerStatus {
        const registeredServices = this.getRegisteredServices()
        const activeSingletons = Object.keys(this.singletons)

        return {
            totalServices: registeredServices.length,
            activeSingletonsCount: activeSingletons.length,
            registeredServices,
            activeSingletons,
            timestamp: new Date().toISOString()
        }
    }

    /**
     * 啟動所有已註冊的 BaseService 實例
     */
    async initializeServices(): Promise<ServiceInitializationResult[]> {
        const results: ServiceInitializationResult[] = []
        const keys = this.registeredKeys()

        this.logger.log(`🚀 [ServiceContainer] 開始初始化 ${keys.length} 個服務...`)

        for (const key of keys) {
            const serviceKey = String(key)
            try {
                const service: unknown = this.resolve(key)

                if (service instanceof BaseService) {
                    await service.start()
                    results.push({ serviceKey, success: true, status: service.getStatus() })
                } else {
                    results.push({ serviceKey, success: true, status: null, message: '非 BaseService 實例，跳過初始化' })
                }
            } catch (error) {
                results.push({
                    serviceKey,
                    success: false,
                    error: error instanceof Error ? error.message : '未知錯誤'
                })
                this.logger.error(`❌ [ServiceContainer] 服務 "${serviceKey}" 初始化失敗:`, error)
            }
        }

        const successCount = results.filter(r => r.success).length
        this.logger.log(`🎯 [ServiceContainer] 服務初始化完成: ${successCount}/${keys.length} 成功`)

        return results
    }

    /**
     * 停止所有已建立且運行中的單例 BaseService
     */
    async cleanupServices(): Promise<ServiceCleanupResult[]> {
        const results: ServiceCleanupResult[] = []
        const keys = this.registeredKeys().filter(key => this.singletons[key] !== undefined)

        for (const key of keys) {
            const serviceKey = String(key)
            try {
                const service: unknown = this.singletons[key]

                if (service instanceof BaseService && service.isRunning) {
                    await service.stop()
                    results.push({ serviceKey, success: true })
                } else {
                    results.push({ serviceKey, success: true, message: '服務未運行或非 BaseService 實例' })
                }
            } catch (error) {
                results.push({
                    serviceKey,
                    success: false,
                    error: error instanceof Error ? error.message : '未知錯誤'
                })
                this.logger.error(`❌ [ServiceContainer] 服務 "${serviceKey}" 清理失敗:`, error)
            }
        }

        const successCount = results.filter(r => r.success).length
        this.logger.log(`🎯 [ServiceContainer] 服務清理完成: ${successCount}/${keys.length} 成功`)

        return results
    }

    private registeredKeys(): (keyof M)[] {
        return this.getRegisteredServices().filter((key): key is Extract<keyof M, string> => isKeyOf(this.providers, key))
    }
}

function isKeyOf<T extends object>(target: T, key: PropertyKey): key is keyof T {
    return key in target
}

/**
 * 服務容器錯誤類別
 */
export class ServiceContainerError extends Error {
    readonly errorType: 'UNREGISTERED_SERVICE' | 'CREATION_FAILED'
    readonly serviceKey: string
    readonly originalError?: unknown

    constructor(
        message: string,
        errorType: 'UNREGISTERED_SERVICE' | 'CREATION_FAILED',
        serviceKey: string,
        originalError?: unknown
    ) {
        super(message)
        this.name = 'ServiceContainerError'
        this.errorType = errorType
        this.serviceKey = serviceKey
        this.originalError = originalError
    }
}

export interface ServiceContainerStatus {
    totalServices: number
    activeSingletonsCount: number
    registeredServices: string[]
    activeSingletons: string[]
    timestamp: string
}

export interface ServiceInitializationResult {
    serviceKey: string
    success: boolean
    status?: ServiceStatus | null
    error?: string
    message?: string
}

export interface ServiceCleanupResult {
    serviceKey: string
    success: boolean
    error?: string
    message?: string
}
