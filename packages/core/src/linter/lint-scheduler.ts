/**
 * LintScheduler
 * watchモードの検査を直列化する
 *
 * 実行中に変更が届いた場合は、完了後に1回だけ再実行する
 */
export class LintScheduler {
  private running: Promise<void> | null = null;
  private pending = false;

  constructor(private readonly run: () => Promise<void>) {}

  /**
   * 検査を要求
   */
  trigger(): void {
    if (this.running) {
      this.pending = true;
      return;
    }
    this.running = this.loop();
  }

  /**
   * 実行中かどうか
   */
  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * 実行中の検査（再実行を含む）の完了を待機
   */
  async waitForIdle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private async loop(): Promise<void> {
    try {
      do {
        this.pending = false;
        try {
          await this.run();
        } catch (error) {
          console.error('[LintScheduler] Run failed:', error);
        }
      } while (this.pending);
    } finally {
      this.running = null;
    }
  }
}
