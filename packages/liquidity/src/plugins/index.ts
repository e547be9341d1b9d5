export * from './types';
export { BasePlugin, type PluginOptions } from './base-plugin';
export * from './order-block.plugin';
export * from './fair-value-gap.plugin';
export * from './liquidity-level.plugin';
export * from './structure-break.plugin';
export * from './breaker-block.plugin';
export * from './liquidity-sweep.plugin';
export * from './displacement.plugin';
