/**
 * Text module for font lookup, wrapping and layout.
 */

export {
  FontResolver,
  DirectoryFontCache,
  createFontResolver,
  EMAIL_SAFE_FONTS,
  type FontCache,
  type FontResolverConfig,
  type FontSource,
  type ResolvedFont,
} from './FontResolver.js';

export { BulletFormatter, BULLET_INDENT, type BulletDot } from './BulletFormatter.js';

export {
  WordWrapper,
  WORD_SPACING_FACTOR,
  MONO_WORD_SPACING_FACTOR,
  MANUAL_BREAK_TOKEN,
  type MeasureFn,
  type PositionedTextRun,
  type WrapResult,
} from './WordWrapper.js';

export {
  TextLayoutEngine,
  CODE_FONT_FAMILY,
  type TextLayoutEngineConfig,
  type ShadedBackground,
  type TextBlockLayout,
  type ListItemLayout,
  type ListLayout,
  type SlideTextContext,
} from './TextLayoutEngine.js';
