import { describe, it, expect } from 'vitest';
import {
  REPORT_TITLE,
  escapeHtml,
  loadReportStylesheet,
  renderHtmlReport,
} from '../../src/report/html-renderer.js';
import { createCheckResult, createReport } from '../../src/report/model.js';
import type { Report } from '../../src/types.js';
import { check } from '../helpers/fake-cursor.js';

const fixedClock = () => new Date(2024, 0, 2, 3, 4, 5);

function sampleReport(): Report {
  const triggers = createCheckResult(
    check('orphaned_triggers', {
      description: 'Triggers without a table\n',
      warningMessage: 'These triggers will be skipped\n',
    }),
    [['HR', 'TRG_A'], ['HR', 'TRG_B']]
  );
  if (!triggers) {
    throw new Error('expected a result');
  }
  return createReport([triggers]);
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe('renderHtmlReport', () => {
  it('renders a heading, warning callout and findings table per check', () => {
    const html = renderHtmlReport(sampleReport(), { now: fixedClock });

    expect(countOccurrences(html, '<h2>orphaned_triggers</h2>')).toBe(1);
    expect(html).toContain([
      '<h2>orphaned_triggers</h2>',
      '<p>Triggers without a table</p>',
      '<p class="warning"><strong>Warning:</strong> These triggers will be skipped</p>',
      '<table>',
      '<tr><th>Findings</th></tr>',
      '<tr><td>HR, TRG_A</td></tr>',
      '<tr><td>HR, TRG_B</td></tr>',
      '</table>',
    ].join('\n'));
    expect(countOccurrences(html, '<tr><td>')).toBe(2);
  });

  it('wraps the body in a titled document with the stylesheet inlined', () => {
    const html = renderHtmlReport(sampleReport(), { now: fixedClock });

    expect(html.startsWith('<!DOCTYPE html>\n<html>\n<head>\n<meta charset="utf-8">\n')).toBe(true);
    expect(html).toContain(`<title>${REPORT_TITLE}</title>`);
    expect(html).toContain(`<style>\n${loadReportStylesheet().trimEnd()}\n</style>`);
    expect(html).toContain(`<h1>${REPORT_TITLE}</h1>\n<p class="generated">Generated on: 2024-01-02 03:04:05</p>`);
    expect(html.endsWith('</body>\n</html>')).toBe(true);
  });

  it('is identical for the same report and clock', () => {
    const report = sampleReport();
    expect(renderHtmlReport(report, { now: fixedClock })).toBe(renderHtmlReport(report, { now: fixedClock }));
  });

  it('omits the warning callout when the check has no warning', () => {
    const result = createCheckResult(check('quiet_check', { warningMessage: undefined }), [['X']]);
    if (!result) {
      throw new Error('expected a result');
    }

    const html = renderHtmlReport(createReport([result]), { now: fixedClock });

    expect(html).not.toContain('class="warning"');
    expect(html).toContain('<p>quiet_check description</p>\n<table>');
  });

  it('escapes markup in names, descriptions and values', () => {
    const result = createCheckResult(
      check('a<b', { description: 'x & y', warningMessage: '"quoted"' }),
      [['<script>']]
    );
    if (!result) {
      throw new Error('expected a result');
    }

    const html = renderHtmlReport(createReport([result]), { now: fixedClock });

    expect(html).toContain('<h2>a&lt;b</h2>');
    expect(html).toContain('<p>x &amp; y</p>');
    expect(html).toContain('<strong>Warning:</strong> &quot;quoted&quot;</p>');
    expect(html).toContain('<tr><td>&lt;script&gt;</td></tr>');
  });

  it('states that there are no findings for an empty report', () => {
    const html = renderHtmlReport(createReport([]), { now: fixedClock });

    expect(html).toContain('<p class="empty">No findings.</p>\n</body>');
    expect(html).not.toContain('<table>');
  });

  it('inlines extra stylesheets after the built-in one', () => {
    const html = renderHtmlReport(createReport([]), {
      now: fixedClock,
      extraStylesheets: ['h1 { color: teal; }\n'],
    });

    expect(html).toContain('<style>\nh1 { color: teal; }\n</style>\n</head>');
  });
});

describe('escapeHtml', () => {
  it('escapes the five markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });
});
