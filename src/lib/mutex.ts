/**
 * Mutex
 * Promise 鏈實作的互斥鎖，依呼叫順序 (FIFO) 取得鎖
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * 取得鎖後執行 fn，完成（或失敗）後釋放
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * 是否有持有者或等待者
   */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
