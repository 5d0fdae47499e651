import { getConfig } from '../../config.js';
import type { CombatHandler } from './handler.js';

/**
 * Drives a handler on a fixed interval: every tick resolves one full turn.
 * Stops itself once the handler has been torn down.
 */
export class CombatTicker {
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(
        private readonly handler: CombatHandler,
        readonly intervalMs: number = getConfig().turnIntervalMs
    ) {
        if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new Error(`Invalid turn interval: ${intervalMs}`);
        }
    }

    get running(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer || this.handler.isDestroyed) return;
        this.timer = setInterval(() => this.tick(), this.intervalMs);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
    }

    private tick(): void {
        if (this.handler.isDestroyed) {
            this.stop();
            return;
        }

        try {
            this.handler.executeFullTurn();
        } catch (e) {
            console.error('[Combat] Turn failed, stopping ticker:', e instanceof Error ? e.message : String(e));
            this.stop();
            return;
        }

        if (this.handler.isDestroyed) {
            this.stop();
        }
    }
}
