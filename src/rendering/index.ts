export type { DrawingSurface, Paint, StrokeStyle, SurfaceFont } from './DrawingSurface.js';

export { SlideRenderer } from './SlideRenderer.js';
export type { SlideRendererConfig } from './SlideRenderer.js';

export { LayerDispatcher } from './LayerDispatcher.js';
export type { LayerContext, LayerDispatcherConfig } from './LayerDispatcher.js';

export { ShapeRenderer, shapePaint } from './ShapeRenderer.js';
export type { ShapeRenderContext, ShapeRendererConfig } from './ShapeRenderer.js';

export { ImageRenderer, computeImageSize } from './ImageRenderer.js';
export type { ImageRenderContext, ImageRendererConfig, ImageSize } from './ImageRenderer.js';

export { TextRenderer } from './TextRenderer.js';
