export { renderCount, renderNumber, renderRate } from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { attachConsoleRenderer, renderConfusionTable, renderSnapshot } from './renderer.js';
