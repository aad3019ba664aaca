/**
 * 聽寫核心配置管理
 * 集中管理所有可由環境變數調整的設定項目
 */

export type HotkeyMode = 'push-to-talk' | 'toggle'

export type ConfigEnv = Record<string, string | undefined>

// 信心分數門檻固定為 0.5，剛好 0.5 視為通過
export const CONFIDENCE_THRESHOLD = 0.5

// setTimeout 接受的最大延遲 (2^31-1 ms)，超過時 Node 會在 1 ms 後觸發
export const MAX_TIMER_DELAY_MS = 2147483647

/**
 * 音訊擷取配置
 */
export interface AudioCaptureSettings {
  bufferSize: number // 每次回呼的取樣數
  sampleRate: number // 取樣率（Hz）
}

/**
 * 聽寫核心配置
 */
export interface DictationConfig {
  maxRecordingDurationMs: number // 單次錄音上限
  errorResetDelayMs: number // 錯誤狀態自動回到 idle
  successDisplayMs: number // 成功提示顯示時間
  healthCheckIntervalMs: number // 健康檢查間隔
  progressTickMs: number // 錄音進度更新間隔
  maxErrorRecoveryAttempts: number
  defaultModelId: string
  defaultHotkey: string
  hotkeyMode: HotkeyMode
  audio: AudioCaptureSettings
  enableDebugLogging: boolean
}

export const DEFAULT_DICTATION_CONFIG: DictationConfig = {
  maxRecordingDurationMs: 5 * 1000,
  errorResetDelayMs: 5000,
  successDisplayMs: 2000,
  healthCheckIntervalMs: 30 * 1000,
  progressTickMs: 100,
  maxErrorRecoveryAttempts: 3,
  defaultModelId: 'openai_whisper-tiny',
  defaultHotkey: 'cmd+shift+v',
  hotkeyMode: 'push-to-talk',
  audio: {
    bufferSize: 1024,
    sampleRate: 16000,
  },
  enableDebugLogging: false,
}

/**
 * 解析正數，無效時回傳 null
 */
function parsePositiveNumber(raw: string | undefined): number | null {
  if (!raw) {
    return null
  }
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null
  }
  return parsed
}

function parsePositiveInteger(raw: string | undefined): number | null {
  const parsed = parsePositiveNumber(raw)
  return parsed !== null && Number.isInteger(parsed) ? parsed : null
}

/**
 * 解析計時器延遲，換算成毫秒後超過 MAX_TIMER_DELAY_MS 視為無效
 */
function parseTimerDelayMs(raw: string | undefined, unitMs: number): number | null {
  const parsed = unitMs === 1 ? parsePositiveInteger(raw) : parsePositiveNumber(raw)
  if (parsed === null) {
    return null
  }
  const delayMs = parsed * unitMs
  return delayMs <= MAX_TIMER_DELAY_MS ? delayMs : null
}

function parseHotkeyMode(raw: string | undefined): HotkeyMode | null {
  if (raw === 'push-to-talk' || raw === 'toggle') {
    return raw
  }
  return null
}

function parseBoolean(raw: string | undefined): boolean | null {
  if (raw === undefined) {
    return null
  }
  const normalized = raw.trim().toLowerCase()
  if (normalized === '1' || normalized === 'true') return true
  if (normalized === '0' || normalized === 'false') return false
  return null
}

/**
 * 從環境變數建立配置，未設定或無效的值使用預設值
 */
export function loadDictationConfig(env: ConfigEnv = process.env): DictationConfig {
  const defaults = DEFAULT_DICTATION_CONFIG

  return {
    ...defaults,
    maxRecordingDurationMs:
      parseTimerDelayMs(env.DICTATION_MAX_RECORDING_DURATION_SEC, 1000) ?? defaults.maxRecordingDurationMs,
    errorResetDelayMs: parseTimerDelayMs(env.DICTATION_ERROR_RESET_DELAY_MS, 1) ?? defaults.errorResetDelayMs,
    successDisplayMs: parseTimerDelayMs(env.DICTATION_SUCCESS_DISPLAY_MS, 1) ?? defaults.successDisplayMs,
    healthCheckIntervalMs:
      parseTimerDelayMs(env.DICTATION_HEALTH_CHECK_INTERVAL_SEC, 1000) ?? defaults.healthCheckIntervalMs,
    defaultModelId: env.DICTATION_DEFAULT_MODEL?.trim() || defaults.defaultModelId,
    defaultHotkey: env.DICTATION_HOTKEY?.trim() || defaults.defaultHotkey,
    hotkeyMode: parseHotkeyMode(env.DICTATION_HOTKEY_MODE) ?? defaults.hotkeyMode,
    audio: {
      bufferSize: parsePositiveInteger(env.DICTATION_AUDIO_BUFFER_SIZE) ?? defaults.audio.bufferSize,
      sampleRate: parsePositiveInteger(env.DICTATION_AUDIO_SAMPLE_RATE) ?? defaults.audio.sampleRate,
    },
    enableDebugLogging: parseBoolean(env.DICTATION_DEBUG) ?? defaults.enableDebugLogging,
  }
}

/**
 * 診斷資訊
 */
export function getConfigInfo(config: DictationConfig): string {
  return `Config: maxDuration=${config.maxRecordingDurationMs}ms, model=${config.defaultModelId}, hotkey=${config.defaultHotkey} (${config.hotkeyMode}), buffer=${config.audio.bufferSize}`
}
