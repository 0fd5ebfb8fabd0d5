import { describe, it, expect } from 'vitest';
import { toPrintToPdfParams, isPaperFormat, PAPER_SIZES } from './page-settings.js';
import { ConfigurationError } from './errors.js';

describe('toPrintToPdfParams', () => {
  it('uses Letter with 0.4 inch margins by default', () => {
    expect(toPrintToPdfParams()).toEqual({
      landscape: false,
      displayHeaderFooter: false,
      printBackground: false,
      scale: 1,
      paperWidth: 8.5,
      paperHeight: 11,
      marginTop: 0.4,
      marginBottom: 0.4,
      marginLeft: 0.4,
      marginRight: 0.4,
      pageRanges: '',
      preferCSSPageSize: false,
      generateDocumentOutline: false,
      generateTaggedPDF: false,
      transferMode: 'ReturnAsBase64',
    });
  });

  it('maps named paper formats to inches', () => {
    const params = toPrintToPdfParams({ paperFormat: 'A4', landscape: true });
    expect(params.paperWidth).toBe(8.27);
    expect(params.paperHeight).toBe(11.7);
    expect(params.landscape).toBe(true);
  });

  it('prefers explicit width and height over the format', () => {
    const params = toPrintToPdfParams({ paperFormat: 'A3', paperWidth: 4, paperHeight: 6 });
    expect([params.paperWidth, params.paperHeight]).toEqual([4, 6]);
  });

  it('passes templates, ranges and the newer flags through', () => {
    const params = toPrintToPdfParams({
      displayHeaderFooter: true,
      headerTemplate: '<span class="title"></span>',
      footerTemplate: '<span class="pageNumber"></span>',
      pageRanges: '1-2',
      marginTop: 0,
      generateDocumentOutline: true,
      generateTaggedPDF: true,
    });
    expect(params.headerTemplate).toBe('<span class="title"></span>');
    expect(params.footerTemplate).toBe('<span class="pageNumber"></span>');
    expect(params.pageRanges).toBe('1-2');
    expect(params.marginTop).toBe(0);
    expect(params.generateDocumentOutline).toBe(true);
    expect(params.generateTaggedPDF).toBe(true);
  });

  it('lets CSS decide the page size for FitPageToContent', () => {
    expect(toPrintToPdfParams({ paperFormat: 'FitPageToContent' }).preferCSSPageSize).toBe(true);
  });

  it('rejects out of range values', () => {
    expect(() => toPrintToPdfParams({ scale: 3 })).toThrow(ConfigurationError);
    expect(() => toPrintToPdfParams({ marginLeft: -1 })).toThrow(ConfigurationError);
    expect(() => toPrintToPdfParams({ paperWidth: 0, paperHeight: 5 })).toThrow(ConfigurationError);
  });
});

describe('isPaperFormat', () => {
  it('knows every table entry and the fit mode', () => {
    for (const name of Object.keys(PAPER_SIZES)) expect(isPaperFormat(name)).toBe(true);
    expect(isPaperFormat('FitPageToContent')).toBe(true);
    expect(isPaperFormat('a4')).toBe(false);
    expect(isPaperFormat('toString')).toBe(false);
  });
});
