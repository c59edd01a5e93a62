export { Logger, createLogger, parseLogLevel, consoleSink } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

export { ImageDecoder, createImageDecoder } from './ImageDecoder.js';
export type { DecodedImage, ImageDecoderConfig, ImageFormat } from './ImageDecoder.js';
