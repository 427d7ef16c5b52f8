/**
 * Ordered pattern rules for locating legal entity names.
 *
 * Rule order sets the scan order of candidates, which only matters for
 * breaking ties between equally frequent names; it is not a priority.
 * Every rule captures the name in group 1 and is bounded to
 * MAX_NAME_LENGTH characters.
 */

export const MAX_NAME_LENGTH = 80;

export const LEGAL_SUFFIXES = [
  'Ltd',
  'Limited',
  'LLC',
  'Inc',
  'Corp',
  'Corporation',
  'GmbH',
  'B.V.',
  'Pty Ltd',
  'S.A.',
] as const;

/** Where a rule can match: raw markup, normalized text, or either. */
export type RuleScope = 'markup' | 'text' | 'any';

/** The kind of content being scanned. */
export type ContentKind = 'markup' | 'text';

export interface PatternRule {
  name: string;
  pattern: RegExp;
  requiresSuffix: boolean;
  scope: RuleScope;
}

export type RuleSetName = 'full' | 'footer' | 'policy';

const NAME_CHARS = "[a-zA-Z0-9\\s&\\-'.,]";
const SUFFIX =
  '(?<![a-zA-Z0-9])(?:Pty\\s+Ltd|Ltd|Limited|LLC|Inc|Corporation|Corp|GmbH|B\\.V\\.|S\\.A\\.)(?![a-zA-Z0-9])';
const LONGEST_SUFFIX = 'Corporation'.length;

/**
 * Capitalised name ending in a legal suffix, at most MAX_NAME_LENGTH long.
 * The first whole-word suffix closes the name, so a footer sentence that
 * follows it is not pulled in.
 */
const SUFFIXED_NAME = `[A-Z]${NAME_CHARS}{0,${MAX_NAME_LENGTH - LONGEST_SUFFIX - 1}}?${SUFFIX}`;

/** Capitalised name without a required suffix, between 3 and MAX_NAME_LENGTH long. */
const BARE_NAME = `[A-Z]${NAME_CHARS}{2,${MAX_NAME_LENGTH - 1}}`;

const COPYRIGHT = '(?:©|&copy;|copyright|\\(c\\))\\s*(?:(?:19|20)\\d{2}(?:\\s*[-–]\\s*(?:19|20)\\d{2})?)\\s+';
const REG_NUMBER = '(?:Number|No)\\.?:?\\s+[A-Z]{0,2}\\s?\\d[\\d\\s]*?';
const ATTR_QUOTE = `["']`;

function rule(name: string, source: string, options: Partial<Omit<PatternRule, 'name' | 'pattern'>> = {}): PatternRule {
  return {
    name,
    pattern: new RegExp(source, 'gis'),
    requiresSuffix: options.requiresSuffix ?? true,
    scope: options.scope ?? 'any',
  };
}

export const RULES = {
  copyrightWithSuffix: rule('copyright-with-suffix', `${COPYRIGHT}(${SUFFIXED_NAME})`),
  copyright: rule('copyright', `${COPYRIGHT}(${BARE_NAME})`, { requiresSuffix: false }),
  dataController: rule(
    'data-controller',
    `(?:data\\s+controller|data\\s+processor|data\\s+owner)\\s+is\\s+(${SUFFIXED_NAME})`,
  ),
  operatedBy: rule(
    'operated-by',
    `(?:is\\s+owned\\s+and\\s+operated\\s+by|trading\\s+as|t/a|operated\\s+by)\\s+(${SUFFIXED_NAME})`,
  ),
  developedBy: rule('developed-by', `(?:developed|powered)\\s+by\\s+(${SUFFIXED_NAME})`),
  rightsReserved: rule('rights-reserved', `(${SUFFIXED_NAME})\\s+All\\s+Rights\\s+Reserved`),
  contactAbout: rule('contact-about', `(?:Contact|About)\\s+(${SUFFIXED_NAME})`),
  registeredAt: rule('registered-at', `(${SUFFIXED_NAME})\\s+is\\s+registered\\s+at`),
  registrationNumberBefore: rule(
    'registration-number-before',
    `Company\\s+Registration\\s+${REG_NUMBER}\\s*[-–]\\s*(${BARE_NAME})`,
    { requiresSuffix: false },
  ),
  registrationNumberAfter: rule(
    'registration-number-after',
    `(${BARE_NAME})[\\s,]+Company\\s+Registration\\s+${REG_NUMBER}`,
    { requiresSuffix: false },
  ),
  vatNumberBefore: rule('vat-number-before', `VAT\\s+${REG_NUMBER}\\s*[-–]\\s*(${BARE_NAME})`, {
    requiresSuffix: false,
  }),
  vatNumberAfter: rule('vat-number-after', `(${BARE_NAME})[\\s,]+VAT\\s+${REG_NUMBER}`, {
    requiresSuffix: false,
  }),
  footer: rule('footer', `<footer\\b[^>]*>(?:(?!</footer>).)*?(${SUFFIXED_NAME})(?:(?!</footer>).)*</footer>`, {
    scope: 'markup',
  }),
  metaAuthor: rule(
    'meta-author',
    `<meta\\s+name=${ATTR_QUOTE}author${ATTR_QUOTE}[^>]*?content=${ATTR_QUOTE}(${SUFFIXED_NAME})${ATTR_QUOTE}[^>]*>`,
    { scope: 'markup' },
  ),
  metaSiteName: rule(
    'meta-site-name',
    `<meta\\s+property=${ATTR_QUOTE}og:site_name${ATTR_QUOTE}[^>]*?content=${ATTR_QUOTE}(${SUFFIXED_NAME})${ATTR_QUOTE}[^>]*>`,
    { scope: 'markup' },
  ),
  founded: rule('founded', `was\\s+founded\\s+(?:in|by)\\s+(${SUFFIXED_NAME})`),
  welcome: rule('welcome', `welcome\\s+to\\s+(${SUFFIXED_NAME})`),
  legalEntity: rule('legal-entity', `(${SUFFIXED_NAME})`, { scope: 'text' }),
} satisfies Record<string, PatternRule>;

export const RULE_SETS: Record<RuleSetName, readonly PatternRule[]> = {
  full: [
    RULES.copyrightWithSuffix,
    RULES.copyright,
    RULES.dataController,
    RULES.operatedBy,
    RULES.developedBy,
    RULES.rightsReserved,
    RULES.contactAbout,
    RULES.registeredAt,
    RULES.registrationNumberBefore,
    RULES.registrationNumberAfter,
    RULES.vatNumberBefore,
    RULES.vatNumberAfter,
    RULES.footer,
    RULES.metaAuthor,
    RULES.metaSiteName,
    RULES.founded,
    RULES.welcome,
  ],
  footer: [
    RULES.copyrightWithSuffix,
    RULES.copyright,
    RULES.operatedBy,
    RULES.developedBy,
    RULES.rightsReserved,
    RULES.contactAbout,
    RULES.registeredAt,
    RULES.footer,
  ],
  policy: [RULES.legalEntity, RULES.dataController, RULES.operatedBy, RULES.copyrightWithSuffix],
};

export function isRuleSetName(value: string): value is RuleSetName {
  return value in RULE_SETS;
}

export function appliesTo(rule: PatternRule, kind: ContentKind): boolean {
  return rule.scope === 'any' || rule.scope === kind;
}
