import type { Candle, LiquidityZone, Timeframe, TimeframeConfig } from '@strata/schemas';
import { createLogger, type Logger } from '@strata/utils';
import type {
  LiquidityPlugin,
  PatternBase,
  PatternStatus,
  PluginName,
  PluginStats,
  ZoneContext,
} from './types';

export interface PluginOptions {
  enabled?: boolean;
  logger?: Logger;
}

/**
 * Shared pattern store and enable flag for liquidity plugins
 *
 * Patterns are keyed by id; `commit` ignores ids already stored and then
 * lets the subclass prune to its cap.
 */
export abstract class BasePlugin<TPattern extends PatternBase, TFilter>
  implements LiquidityPlugin<TPattern, TFilter>
{
  abstract readonly name: PluginName;

  protected readonly patterns = new Map<string, TPattern>();
  protected readonly logger: Logger;
  private isEnabled: boolean;

  constructor(
    protected readonly symbol: string,
    protected readonly config: TimeframeConfig,
    options: PluginOptions = {}
  ) {
    this.isEnabled = options.enabled ?? true;
    this.logger = options.logger ?? createLogger('liquidity:plugins');
  }

  get timeframe(): Timeframe {
    return this.config.timeframe;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  enable(): void {
    this.isEnabled = true;
  }

  disable(): void {
    this.isEnabled = false;
  }

  abstract detect(candles: Candle[]): TPattern[];
  abstract update(candles: Candle[], price: number): void;
  abstract get(filter?: TFilter): TPattern[];
  abstract toZone(pattern: TPattern, ctx: ZoneContext): LiquidityZone | null;

  commit(patterns: TPattern[]): TPattern[] {
    const added: TPattern[] = [];
    for (const pattern of patterns) {
      if (this.patterns.has(pattern.id) || this.isDuplicate(pattern)) continue;
      this.patterns.set(pattern.id, structuredClone(pattern));
      added.push(structuredClone(pattern));
    }
    if (added.length > 0) {
      this.prune();
      this.logger.debug({
        event: 'patterns_committed',
        plugin: this.name,
        symbol: this.symbol,
        timeframe: this.timeframe,
        added: added.length,
        total: this.patterns.size,
      }, `${this.name}: ${added.length} new patterns`);
    }
    return added;
  }

  status(id: string): PatternStatus | undefined {
    const pattern = this.patterns.get(id);
    return pattern ? this.statusOf(pattern) : undefined;
  }

  stats(): PluginStats {
    let active = 0;
    for (const pattern of this.patterns.values()) {
      if (this.statusOf(pattern) === 'active') active++;
    }
    return { name: this.name, enabled: this.isEnabled, total: this.patterns.size, active };
  }

  clear(): void {
    this.patterns.clear();
  }

  protected statusOf(_pattern: TPattern): PatternStatus {
    return 'active';
  }

  /** Secondary dedupe for patterns whose id can drift between refreshes */
  protected isDuplicate(_pattern: TPattern): boolean {
    return false;
  }

  /** Enforce the store cap after a commit */
  protected prune(): void {}

  /** Replace the store with `patterns`, keeping their order */
  protected retain(patterns: TPattern[]): void {
    this.patterns.clear();
    for (const pattern of patterns) this.patterns.set(pattern.id, pattern);
  }

  /** Copies of stored patterns, optionally filtered */
  protected select(predicate: (pattern: TPattern) => boolean = () => true): TPattern[] {
    const result: TPattern[] = [];
    for (const pattern of this.patterns.values()) {
      if (predicate(pattern)) result.push(structuredClone(pattern));
    }
    return result;
  }
}
