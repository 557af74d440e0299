/**
 * 同步互斥
 *
 * 持锁期间重入的写入（比如被接管的 stderr 在 append 内部收到一条警告）
 * 进入队列，当前持有者完成后依次执行。
 */
export class SyncLock {
  private held = false;
  private readonly pending: Array<() => void> = [];

  get locked(): boolean {
    return this.held;
  }

  run(task: () => void): void {
    if (this.held) {
      this.pending.push(task);
      return;
    }
    this.held = true;
    try {
      task();
      let next = this.pending.shift();
      while (next) {
        next();
        next = this.pending.shift();
      }
    } finally {
      this.held = false;
    }
  }
}
