/**
 * SerialExecutor - 單一寫入者佇列
 *
 * 所有工作依接收順序逐一執行，前一個工作完成（或失敗）後才開始下一個。
 * 失敗的工作只會讓自己的 Promise reject，不會卡住後續工作。
 */
export class SerialExecutor {
    private tail: Promise<void> = Promise.resolve()
    private pending = 0

    run<T>(task: () => T | Promise<T>): Promise<T> {
        this.pending++
        const result = this.tail.then(task)
        const settle = () => {
            this.pending--
        }
        this.tail = result.then(settle, settle)
        return result
    }

    /**
     * 尚未完成的工作數量（含執行中）
     */
    get size(): number {
        return this.pending
    }

    /**
     * 等待目前已排入的工作全部結束
     */
    drain(): Promise<void> {
        return this.tail
    }
}
