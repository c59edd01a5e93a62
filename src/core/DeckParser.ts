import { XMLParser, XMLValidator, type X2jOptions } from 'fast-xml-parser';
import type {
  ArcShape,
  CurveShape,
  DeckDocument,
  EllipseShape,
  Gradient,
  ImageShape,
  LineShape,
  ListItem,
  ListShape,
  ListType,
  PolygonShape,
  RectShape,
  Slide,
  TextAnchor,
  TextShape,
  TextType,
} from '../types/index.js';
import {
  DEFAULT_BACKGROUND,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
  DEFAULT_FOREGROUND,
  LINE_SPACING,
  LIST_SPACING,
  LIST_WRAP,
  SHAPE_ELEMENT_TAGS,
} from './constants.js';
import { ParseError } from './errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Parsed XML element: attributes under `@_name`, children by tag, text under `#text`.
 */
export type XmlNode = Record<string, unknown>;

/**
 * XML attribute prefix used by fast-xml-parser.
 */
export const ATTR_PREFIX = '@_';

const TEXT_NODE = '#text';

/**
 * Elements that always parse to arrays, even when they appear once.
 */
const ARRAY_ELEMENTS = new Set<string>(['slide', 'li', ...SHAPE_ELEMENT_TAGS]);

const XML_PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  alwaysCreateTextNode: true,
  isArray: (name: string): boolean => ARRAY_ELEMENTS.has(name),
};

/**
 * Type guard for parsed element objects.
 */
export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Gets an attribute value as a string.
 */
export function getXmlAttr(node: XmlNode | undefined, attr: string): string | undefined {
  if (!node) return undefined;
  const value = node[`${ATTR_PREFIX}${attr}`];
  return value !== undefined && value !== null ? String(value) : undefined;
}

/**
 * Gets child elements by tag name. Text-only children become text nodes.
 */
export function getXmlChildren(node: XmlNode | undefined, tag: string): XmlNode[] {
  if (!node) return [];
  const child = node[tag];
  if (child === undefined || child === null) return [];
  const list: unknown[] = Array.isArray(child) ? child : [child];
  return list.map((item) => (isXmlNode(item) ? item : { [TEXT_NODE]: String(item) }));
}

/**
 * Gets the first child element by tag name.
 */
export function getXmlChild(node: XmlNode | undefined, tag: string): XmlNode | undefined {
  return getXmlChildren(node, tag)[0];
}

/**
 * Gets the character data of an element.
 */
export function getXmlText(node: XmlNode | undefined): string {
  const text = node?.[TEXT_NODE];
  return text === undefined || text === null ? '' : String(text);
}

const DECK_PATTERN = /<deck\b[^>]*?(?:\/>|>([\s\S]*)<\/deck\s*>)/;
const CANVAS_PATTERN = /<canvas\b[^>]*?(?:\/>|>[\s\S]*?<\/canvas\s*>)/;
const XML_DECLARATION = /^\s*<\?xml[^>]*\?>/;

/**
 * Wraps slide-less XML into a single synthetic slide.
 *
 * Input containing a slide, or blank input, is returned unchanged. Shapes
 * directly inside `deck` keep the deck's canvas when it has one; bare
 * elements get a canvas of the given size.
 */
export function wrapInSlideIfNeeded(
  xml: string,
  width: number = DEFAULT_CANVAS_WIDTH,
  height: number = DEFAULT_CANVAS_HEIGHT
): string {
  if (xml.trim() === '' || xml.includes('<slide')) {
    return xml;
  }

  const body = xml.replace(XML_DECLARATION, '');
  const deck = DECK_PATTERN.exec(body);
  let content = deck ? (deck[1] ?? '') : body;

  let canvas = `<canvas width="${width}" height="${height}"/>`;
  const existing = CANVAS_PATTERN.exec(content);
  if (deck && existing) {
    canvas = existing[0];
    content = content.replace(existing[0], '');
  }

  return `<deck>${canvas}<slide>${content}</slide></deck>`;
}

/**
 * Normalizes an alignment name to a text anchor.
 */
export function parseTextAnchor(value: string | undefined, fallback: TextAnchor): TextAnchor {
  switch (value?.trim().toLowerCase()) {
    case 'center':
    case 'middle':
    case 'mid':
    case 'c':
      return 'middle';
    case 'right':
    case 'end':
    case 'e':
      return 'end';
    case 'left':
    case 'start':
    case 's':
      return 'start';
    default:
      return fallback;
  }
}

/**
 * Configuration for DeckParser.
 */
export interface DeckParserConfig {
  /** Canvas width for auto-wrapped fragments */
  defaultWidth?: number;
  /** Canvas height for auto-wrapped fragments */
  defaultHeight?: number;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Parses deck XML into the document model.
 */
export class DeckParser {
  private readonly logger: ILogger;
  private readonly xmlParser: XMLParser;
  private readonly defaultWidth: number;
  private readonly defaultHeight: number;

  constructor(config: DeckParserConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'DeckParser');
    this.xmlParser = new XMLParser(XML_PARSER_OPTIONS);
    this.defaultWidth = config.defaultWidth ?? DEFAULT_CANVAS_WIDTH;
    this.defaultHeight = config.defaultHeight ?? DEFAULT_CANVAS_HEIGHT;
  }

  /**
   * Parses deck XML.
   *
   * @throws ParseError for malformed XML, a missing canvas, no slides or an
   * unreadable numeric attribute
   */
  parse(xml: string): DeckDocument {
    if (xml.trim() === '') {
      throw new ParseError('Empty deck document');
    }

    const wrapped = wrapInSlideIfNeeded(xml, this.defaultWidth, this.defaultHeight);
    if (wrapped !== xml) {
      this.logger.debug('Wrapped fragment in a synthetic slide');
    }

    const validation = XMLValidator.validate(wrapped);
    if (validation !== true) {
      throw new ParseError(`Malformed deck XML at line ${validation.err.line}: ${validation.err.msg}`);
    }

    const parsed: unknown = this.xmlParser.parse(wrapped);
    const deck = isXmlNode(parsed) ? parsed['deck'] : undefined;
    if (!isXmlNode(deck)) {
      throw new ParseError('Missing deck element', { element: 'deck' });
    }

    const canvas = getXmlChild(deck, 'canvas');
    if (!canvas) {
      throw new ParseError('Missing canvas element', { element: 'canvas' });
    }
    const width = readNumber(canvas, 'canvas', 'width');
    const height = readNumber(canvas, 'canvas', 'height');
    if (!(width > 0) || !(height > 0)) {
      throw new ParseError(`Canvas size must be positive, got ${width}x${height}`, { element: 'canvas' });
    }

    const slides = getXmlChildren(deck, 'slide').map((slide) => this.parseSlide(slide));
    if (slides.length === 0) {
      throw new ParseError('Deck has no slides', { element: 'slide' });
    }

    const titleNode = getXmlChild(deck, 'title');
    const title = titleNode ? getXmlText(titleNode) : undefined;

    this.logger.debug('Parsed deck', { width, height, slideCount: slides.length });

    return { width, height, title: title ? title : undefined, slides };
  }

  private parseSlide(node: XmlNode): Slide {
    return {
      background: readString(node, 'bg') ?? DEFAULT_BACKGROUND,
      foreground: readString(node, 'fg') ?? DEFAULT_FOREGROUND,
      gradient: readGradient(node, 'slide'),
      rects: getXmlChildren(node, 'rect').map(parseRect),
      ellipses: getXmlChildren(node, 'ellipse').map(parseEllipse),
      lines: getXmlChildren(node, 'line').map(parseLine),
      arcs: getXmlChildren(node, 'arc').map(parseArc),
      curves: getXmlChildren(node, 'curve').map(parseCurve),
      polygons: getXmlChildren(node, 'polygon').map(parsePolygon),
      texts: getXmlChildren(node, 'text').map(parseText),
      lists: getXmlChildren(node, 'list').map(parseList),
      images: getXmlChildren(node, 'image').map(parseImage),
    };
  }
}

function readString(node: XmlNode, attr: string): string | undefined {
  const value = getXmlAttr(node, attr)?.trim();
  return value ? value : undefined;
}

function readNumber(node: XmlNode, element: string, attr: string, fallback: number = 0): number {
  const raw = getXmlAttr(node, attr)?.trim();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ParseError(`Invalid ${attr} "${raw}" on <${element}>`, { element, attribute: attr });
  }
  return value;
}

/**
 * Opacity percent; 0 or absent means opaque.
 */
function readOpacity(node: XmlNode, element: string): number {
  const value = readNumber(node, element, 'opacity');
  return value > 0 ? value : 100;
}

function readGradient(node: XmlNode, element: string): Gradient | undefined {
  const color1 = readString(node, 'gradcolor1');
  const color2 = readString(node, 'gradcolor2');
  if (!color1 || !color2) {
    return undefined;
  }
  const gp = readNumber(node, element, 'gp');
  return { color1, color2, percent: gp <= 0 || gp > 100 ? 100 : gp };
}

function parseRect(node: XmlNode): RectShape {
  return {
    kind: 'rect',
    xp: readNumber(node, 'rect', 'xp'),
    yp: readNumber(node, 'rect', 'yp'),
    wp: readNumber(node, 'rect', 'wp'),
    hp: readNumber(node, 'rect', 'hp'),
    hr: readNumber(node, 'rect', 'hr'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'rect'),
    gradient: readGradient(node, 'rect'),
  };
}

function parseEllipse(node: XmlNode): EllipseShape {
  return {
    kind: 'ellipse',
    xp: readNumber(node, 'ellipse', 'xp'),
    yp: readNumber(node, 'ellipse', 'yp'),
    wp: readNumber(node, 'ellipse', 'wp'),
    hp: readNumber(node, 'ellipse', 'hp'),
    hr: readNumber(node, 'ellipse', 'hr'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'ellipse'),
  };
}

function parseLine(node: XmlNode): LineShape {
  return {
    kind: 'line',
    xp1: readNumber(node, 'line', 'xp1'),
    yp1: readNumber(node, 'line', 'yp1'),
    xp2: readNumber(node, 'line', 'xp2'),
    yp2: readNumber(node, 'line', 'yp2'),
    sp: readNumber(node, 'line', 'sp'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'line'),
  };
}

function parseArc(node: XmlNode): ArcShape {
  return {
    kind: 'arc',
    xp: readNumber(node, 'arc', 'xp'),
    yp: readNumber(node, 'arc', 'yp'),
    wp: readNumber(node, 'arc', 'wp'),
    hp: readNumber(node, 'arc', 'hp'),
    a1: readNumber(node, 'arc', 'a1'),
    a2: readNumber(node, 'arc', 'a2'),
    sp: readNumber(node, 'arc', 'sp'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'arc'),
  };
}

function parseCurve(node: XmlNode): CurveShape {
  return {
    kind: 'curve',
    xp1: readNumber(node, 'curve', 'xp1'),
    yp1: readNumber(node, 'curve', 'yp1'),
    xp2: readNumber(node, 'curve', 'xp2'),
    yp2: readNumber(node, 'curve', 'yp2'),
    xp3: readNumber(node, 'curve', 'xp3'),
    yp3: readNumber(node, 'curve', 'yp3'),
    sp: readNumber(node, 'curve', 'sp'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'curve'),
  };
}

/**
 * Splits a coordinate list. Unreadable entries stay NaN and draw at 0.
 */
function readCoordinates(node: XmlNode, attr: string): number[] {
  const raw = getXmlAttr(node, attr)?.trim() ?? '';
  if (raw === '') return [];
  return raw.split(/\s+/).map((token) => Number(token));
}

function parsePolygon(node: XmlNode): PolygonShape {
  return {
    kind: 'polygon',
    xc: readCoordinates(node, 'xc'),
    yc: readCoordinates(node, 'yc'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'polygon'),
  };
}

function readTextAnchor(value: string | undefined): TextAnchor | undefined {
  return value ? parseTextAnchor(value, 'start') : undefined;
}

function readTextType(value: string | undefined): TextType {
  return value === 'block' || value === 'code' ? value : 'free';
}

function readListType(value: string | undefined): ListType {
  return value === 'bullet' || value === 'number' ? value : 'plain';
}

function readWeight(node: XmlNode, element: string): number | undefined {
  const weight = readNumber(node, element, 'weight');
  return weight > 0 ? weight : undefined;
}

function parseText(node: XmlNode): TextShape {
  const lp = readNumber(node, 'text', 'lp');
  return {
    kind: 'text',
    xp: readNumber(node, 'text', 'xp'),
    yp: readNumber(node, 'text', 'yp'),
    sp: readNumber(node, 'text', 'sp'),
    wp: readNumber(node, 'text', 'wp'),
    type: readTextType(readString(node, 'type')),
    align: readTextAnchor(readString(node, 'align')),
    font: readString(node, 'font'),
    weight: readWeight(node, 'text'),
    lp: lp === 0 ? LINE_SPACING : lp,
    rotation: readNumber(node, 'text', 'rotation'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'text'),
    content: getXmlText(node),
  };
}

function parseListItem(node: XmlNode): ListItem {
  const opacity = readNumber(node, 'li', 'opacity');
  return {
    content: getXmlText(node),
    color: readString(node, 'color'),
    font: readString(node, 'font'),
    opacity: opacity > 0 ? opacity : undefined,
  };
}

function parseList(node: XmlNode): ListShape {
  const lp = readNumber(node, 'list', 'lp');
  const wp = readNumber(node, 'list', 'wp');
  return {
    kind: 'list',
    xp: readNumber(node, 'list', 'xp'),
    yp: readNumber(node, 'list', 'yp'),
    sp: readNumber(node, 'list', 'sp'),
    wp: wp === 0 ? LIST_WRAP : wp,
    type: readListType(readString(node, 'type')),
    align: parseTextAnchor(readString(node, 'align'), 'start'),
    font: readString(node, 'font'),
    weight: readWeight(node, 'list'),
    lp: lp === 0 ? LIST_SPACING : lp,
    rotation: readNumber(node, 'list', 'rotation'),
    color: readString(node, 'color'),
    opacity: readOpacity(node, 'list'),
    items: getXmlChildren(node, 'li').map(parseListItem),
  };
}

function parseImage(node: XmlNode): ImageShape {
  const name = readString(node, 'name');
  if (!name) {
    throw new ParseError('Image has no name', { element: 'image', attribute: 'name' });
  }
  return {
    kind: 'image',
    name,
    xp: readNumber(node, 'image', 'xp'),
    yp: readNumber(node, 'image', 'yp'),
    width: readNumber(node, 'image', 'width'),
    height: readNumber(node, 'image', 'height'),
    scale: readNumber(node, 'image', 'scale'),
    autoscale: readString(node, 'autoscale') === 'on',
    caption: readString(node, 'caption'),
    sp: readNumber(node, 'image', 'sp'),
    font: readString(node, 'font'),
    color: readString(node, 'color'),
    align: parseTextAnchor(readString(node, 'align'), 'middle'),
  };
}

/**
 * Parses deck XML with a default-configured parser.
 */
export function parseDeck(xml: string, config?: DeckParserConfig): DeckDocument {
  return new DeckParser(config).parse(xml);
}
