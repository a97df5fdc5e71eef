import {
  getElementStyle,
  getStyleTemplate,
  isStyleTemplateName,
  styleAttr,
  STYLE_TEMPLATE_NAMES,
  STYLE_TEMPLATES,
} from '../../src/core/styles';

describe('STYLE_TEMPLATES', () => {
  it('has one template per name', () => {
    expect(Object.keys(STYLE_TEMPLATES).sort()).toEqual([...STYLE_TEMPLATE_NAMES].sort());
    for (const name of STYLE_TEMPLATE_NAMES) {
      expect(STYLE_TEMPLATES[name].name).toBe(name);
    }
  });

  it.each(STYLE_TEMPLATE_NAMES)('%s styles code, tables and quotes', (name) => {
    const template = STYLE_TEMPLATES[name];
    for (const element of ['pre', 'inline-code', 'table', 'th,td', 'blockquote']) {
      expect(template.styles[element]).toBeTruthy();
    }
    expect(template.codeTheme.keyword).toMatch(/^color: #[0-9a-f]{6};$/);
  });

  it('never uses double quotes inside a style value', () => {
    for (const template of Object.values(STYLE_TEMPLATES)) {
      for (const style of [...Object.values(template.styles), ...Object.values(template.codeTheme)]) {
        expect(style).not.toContain('"');
      }
    }
  });
});

describe('getStyleTemplate', () => {
  it('returns a template by name', () => {
    expect(getStyleTemplate('enhanced').label).toBe('Enhanced');
  });

  it('falls back to minimal', () => {
    expect(getStyleTemplate('neon').name).toBe('minimal');
  });
});

describe('isStyleTemplateName', () => {
  it('accepts known names only', () => {
    expect(isStyleTemplateName('document')).toBe(true);
    expect(isStyleTemplateName('Document')).toBe(false);
  });
});

describe('getElementStyle', () => {
  it('returns the shared cell style for th and td', () => {
    expect(getElementStyle(STYLE_TEMPLATES.minimal, 'td')).toBe(
      'border: 1px solid #d0d7de; padding: 6px 12px;',
    );
  });

  it('appends the element style to the shared cell style', () => {
    expect(getElementStyle(STYLE_TEMPLATES.document, 'th')).toBe(
      'border: 1px solid #999; padding: 8px 10px; background-color: #f2f2f2; font-weight: 600;',
    );
  });

  it('returns an empty string for unstyled elements', () => {
    expect(getElementStyle(STYLE_TEMPLATES.minimal, 'h1')).toBe('');
  });
});

describe('styleAttr', () => {
  it('renders a style attribute', () => {
    expect(styleAttr(STYLE_TEMPLATES.enhanced, 'a')).toBe(' style="color: #0969da;"');
  });

  it('renders nothing for unstyled elements', () => {
    expect(styleAttr(STYLE_TEMPLATES.minimal, 'p')).toBe('');
  });
});
