import { describe, it, expect } from 'vitest';
import { NameExtractor, RULES, RULE_SETS } from './index.js';

describe('NameExtractor', () => {
  const extractor = new NameExtractor();

  it('picks the suffixed copyright holder over the longer bare capture', () => {
    expect(extractor.extractCompanyName('© 2023 Acme Widgets Ltd. All rights reserved.', 'text')).toBe(
      'Acme Widgets Ltd',
    );
  });

  it('picks the most frequently mentioned name', () => {
    const text = '© 2022 Beta Corp | © 2022 Beta Corp | Gamma Inc All Rights Reserved';
    expect(extractor.extractCompanyName(text, 'text')).toBe('Beta Corp');
  });

  it('returns null when the only candidate is a navigation phrase', () => {
    expect(extractor.extractCompanyName('© 2024 Privacy Policy', 'text')).toBeNull();
  });

  it('reads meta tags only from markup', () => {
    const html = '<meta name="author" content="Vandelay Industries LLC">';

    expect(extractor.extractCompanyName(html, 'markup')).toBe('Vandelay Industries LLC');
    expect(extractor.extractCompanyName(html, 'text')).toBeNull();
  });

  it('falls through to the next name when the top one cleans away', () => {
    const text = '© 2020 Home Contact Menu | © 2020 Home Contact Menu | © 2020 Vortex Ltd';
    expect(new NameExtractor([RULES.copyright]).extractCompanyName(text, 'text')).toBe('Vortex Ltd');
  });

  it('returns the cleaned name', () => {
    expect(new NameExtractor('policy').extractCompanyName('Contact Acme Ltd today', 'text')).toBe('Acme Ltd');
  });

  it('resolves rule sets by name', () => {
    expect(new NameExtractor('footer').rules).toBe(RULE_SETS.footer);
  });

  it('is deterministic', () => {
    const text = '© 2022 Beta Corp | Gamma Inc All Rights Reserved | Welcome to Gamma Inc';
    const first = extractor.extractCompanyName(text, 'text');

    expect(first).toBe('Beta Corp');
    expect(extractor.extractCompanyName(text, 'text')).toBe(first);
  });
});
