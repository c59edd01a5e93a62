export {
  DeckRenderer,
  createRenderer,
  renderDeck,
  renderDeckFile,
  defaultOutputName,
  isOutputFormat,
  writeOutput,
} from './DeckRenderer.js';
export type { IDeckRenderer, DeckRendererConfig } from './DeckRenderer.js';

export { DeckshCompiler, PassThroughCompiler } from './DeckCompiler.js';
export type { DeckCompiler, DeckshCompilerConfig } from './DeckCompiler.js';

export {
  DeckParser,
  parseDeck,
  parseTextAnchor,
  wrapInSlideIfNeeded,
  getXmlAttr,
  getXmlChild,
  getXmlChildren,
  getXmlText,
  isXmlNode,
  ATTR_PREFIX,
} from './DeckParser.js';
export type { DeckParserConfig, XmlNode } from './DeckParser.js';

export {
  UnitConverter,
  FONT_FACTOR,
  pct,
  deviceX,
  deviceY,
  percentFromDeviceY,
  dimen,
  pwidth,
} from './UnitConverter.js';
export type { DeviceDimen } from './UnitConverter.js';

export { loadEnvironmentConfig, parseLayerList, resolveRenderOptions, DEFAULT_COMPILER_PATH } from './config.js';
export type { EnvironmentConfig } from './config.js';

export {
  DeckError,
  CompileError,
  ParseError,
  UnsupportedFormatError,
  SlideIndexError,
  FontLoadWarning,
  OutputIOError,
  StageError,
  wrapStageError,
} from './errors.js';
export type { DeckErrorCode, PipelineStage } from './errors.js';

export * from './constants.js';
