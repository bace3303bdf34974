export * from './errors';
export { CardCompositor } from './services/cards/cardCompositor';
export type { CardLayer, CardPage, ComposedCard, SidebarEntry } from './services/cards/cardCompositor';
export { CardRasterizer } from './services/cards/cardRasterizer';
export { CardRenderer } from './services/cards/cardRenderer';
export type { RenderedCard } from './services/cards/cardRenderer';
export { generateCards, selectRecord } from './services/batch/cardBatch';
export type { BatchOptions, BatchResult } from './services/batch/cardBatch';
export { loadSpellsFromFile, parseSpellsCsv, parseSpellsYaml } from './services/records/recordLoader';
export { parseSpellRecord } from './services/records/spellRecord';
export type { SpellRecord, SpellRecordInput } from './services/records/spellRecord';
export { ResourceCache } from './services/resources/resourceCache';
export { DirectoryStrategy, ResourceResolver } from './services/resources/resourceResolver';
export type { ResolverStrategy, ResourceRoots } from './services/resources/resourceResolver';
export {
  defaultStyleDocument,
  loadStyleConfig,
  makeDefaultStyleConfig,
  mergeWithDefaults,
  readStyleConfigFile,
} from './services/style/styleConfig';
export type { StyleConfig } from './services/style/styleConfig';
export { OpentypeFace } from './services/text/fontFace';
export type { FontFace } from './services/text/fontFace';
export { paginate } from './services/text/paginator';
export type { PageChunk } from './services/text/paginator';
export { fitText, wrapText } from './services/text/textFitter';
export type { FittedText, Fitter } from './services/text/textFitter';
export { createApp } from './server';
