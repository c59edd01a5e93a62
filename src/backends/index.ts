export { selectSlide, slideTitle } from './Backend.js';
export type { Backend, BackendConfig, DocumentBackend, SlideBackend } from './Backend.js';

export { CanvasFontRegistry, reportFontWarning } from './CanvasFonts.js';
export type { CanvasFontRegistryConfig, FontWarningHandler } from './CanvasFonts.js';

export { SvgBackend } from './SvgBackend.js';
export { SvgSurface, escapeXml, ellipsePoint } from './SvgSurface.js';
export type { SvgSurfaceConfig } from './SvgSurface.js';

export { PngBackend } from './PngBackend.js';
export { CanvasSurface, quantizeOpacity } from './CanvasSurface.js';

export { PdfBackend } from './PdfBackend.js';
export { PdfSurface, arcChordPoints, standardPdfFont } from './PdfSurface.js';
export type { PdfSurfaceConfig } from './PdfSurface.js';
