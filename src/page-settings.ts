import { ConfigurationError, ErrorCode } from './errors.js';

/** Named paper sizes. `FitPageToContent` needs a `ContentFitter` on the converter. */
export type PaperFormat =
  | 'Letter' | 'Legal' | 'Tabloid' | 'Ledger'
  | 'A0' | 'A1' | 'A2' | 'A3' | 'A4' | 'A5' | 'A6'
  | 'FitPageToContent';

export type ColorMode = 'color' | 'grayscale';

/** PDF page layout. Lengths are in inches. */
export interface PageSettings {
  /** Default: `false` */
  landscape?: boolean;
  /** Print the header and footer templates. Default: `false` */
  displayHeaderFooter?: boolean;
  /** Print background graphics. Default: `false` */
  printBackground?: boolean;
  /** Scale of the page rendering, between 0.1 and 2. Default: `1` */
  scale?: number;
  /** Named paper size. Ignored when `paperWidth` and `paperHeight` are both set. Default: `'Letter'` */
  paperFormat?: PaperFormat;
  paperWidth?: number;
  paperHeight?: number;
  marginTop?: number;
  marginBottom?: number;
  marginLeft?: number;
  marginRight?: number;
  /** Pages to print, e.g. `'1-5, 8, 11-13'`. Default: all pages */
  pageRanges?: string;
  /**
   * HTML template for the print header. Elements with the classes `date`,
   * `title`, `url`, `pageNumber` and `totalPages` get the matching values.
   */
  headerTemplate?: string;
  /** HTML template for the print footer, same format as `headerTemplate`. */
  footerTemplate?: string;
  /** Prefer the page size defined by CSS `@page`. Default: `false` */
  preferCSSPageSize?: boolean;
  /** Embed a document outline built from the headings. Default: `false` */
  generateDocumentOutline?: boolean;
  /** Generate a tagged (accessible) PDF. Default: `false` */
  generateTaggedPDF?: boolean;
  /** Default: `'color'` */
  colorMode?: ColorMode;
}

/** Parameters of the `Page.printToPDF` command. */
export type PrintToPdfParams = {
  landscape: boolean;
  displayHeaderFooter: boolean;
  printBackground: boolean;
  scale: number;
  paperWidth: number;
  paperHeight: number;
  marginTop: number;
  marginBottom: number;
  marginLeft: number;
  marginRight: number;
  pageRanges: string;
  headerTemplate?: string;
  footerTemplate?: string;
  preferCSSPageSize: boolean;
  generateDocumentOutline: boolean;
  generateTaggedPDF: boolean;
  transferMode: 'ReturnAsBase64';
};

/** Width and height in inches, portrait. */
export const PAPER_SIZES: Readonly<Record<Exclude<PaperFormat, 'FitPageToContent'>, readonly [number, number]>> = {
  Letter: [8.5, 11],
  Legal: [8.5, 14],
  Tabloid: [11, 17],
  Ledger: [17, 11],
  A0: [33.1, 46.8],
  A1: [23.4, 33.1],
  A2: [16.54, 23.4],
  A3: [11.7, 16.54],
  A4: [8.27, 11.7],
  A5: [5.83, 8.27],
  A6: [4.13, 5.83],
};

const DEFAULT_MARGIN = 0.4;

function nonNegative(value: number | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `${name} has to be 0 or more, got ${value}`);
  }
  return value;
}

function paperSize(settings: PageSettings): [number, number] {
  if (settings.paperWidth !== undefined && settings.paperHeight !== undefined) {
    if (!(settings.paperWidth > 0) || !(settings.paperHeight > 0)) {
      throw new ConfigurationError(ErrorCode.INVALID_SIZE, `Paper size ${settings.paperWidth}x${settings.paperHeight} is not valid`);
    }
    return [settings.paperWidth, settings.paperHeight];
  }
  const format = settings.paperFormat ?? 'Letter';
  // sized by the @page rule the content fitter writes
  const [width, height] = format === 'FitPageToContent' ? PAPER_SIZES.Letter : PAPER_SIZES[format];
  return [width, height];
}

/** Maps page settings onto `Page.printToPDF` parameters. */
export function toPrintToPdfParams(settings: PageSettings = {}): PrintToPdfParams {
  const scale = settings.scale ?? 1;
  if (!Number.isFinite(scale) || scale < 0.1 || scale > 2) {
    throw new ConfigurationError(ErrorCode.INVALID_ARGUMENT, `scale has to be between 0.1 and 2, got ${scale}`);
  }
  const [paperWidth, paperHeight] = paperSize(settings);
  const params: PrintToPdfParams = {
    landscape: settings.landscape ?? false,
    displayHeaderFooter: settings.displayHeaderFooter ?? false,
    printBackground: settings.printBackground ?? false,
    scale,
    paperWidth,
    paperHeight,
    marginTop: nonNegative(settings.marginTop, 'marginTop', DEFAULT_MARGIN),
    marginBottom: nonNegative(settings.marginBottom, 'marginBottom', DEFAULT_MARGIN),
    marginLeft: nonNegative(settings.marginLeft, 'marginLeft', DEFAULT_MARGIN),
    marginRight: nonNegative(settings.marginRight, 'marginRight', DEFAULT_MARGIN),
    pageRanges: settings.pageRanges ?? '',
    preferCSSPageSize: settings.preferCSSPageSize ?? false,
    generateDocumentOutline: settings.generateDocumentOutline ?? false,
    generateTaggedPDF: settings.generateTaggedPDF ?? false,
    transferMode: 'ReturnAsBase64',
  };
  if (settings.headerTemplate !== undefined) params.headerTemplate = settings.headerTemplate;
  if (settings.footerTemplate !== undefined) params.footerTemplate = settings.footerTemplate;
  if (settings.preferCSSPageSize || settings.paperFormat === 'FitPageToContent') params.preferCSSPageSize = true;
  return params;
}

export function isPaperFormat(value: string): value is PaperFormat {
  return value === 'FitPageToContent' || Object.prototype.hasOwnProperty.call(PAPER_SIZES, value);
}

/** Script that turns the whole document gray before printing. */
export const GRAYSCALE_SCRIPT = `(() => {
  const style = document.createElement('style');
  style.textContent = 'html { filter: grayscale(100%) !important; -webkit-filter: grayscale(100%) !important; }';
  (document.head || document.documentElement).appendChild(style);
})()`;
