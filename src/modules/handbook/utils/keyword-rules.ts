export interface KeywordRule<T> {
  keywords: readonly string[];
  value: T;
}

/** Value of the first rule with a keyword contained in the lowercased text. */
export function firstMatch<T>(
  rules: readonly KeywordRule<T>[],
  text: string,
): T | undefined {
  const lower = text.toLowerCase();
  return rules.find((rule) => rule.keywords.some((k) => lower.includes(k)))
    ?.value;
}

export const SEARCH_FILTER_RULES: readonly KeywordRule<string>[] = [
  {
    keywords: ['security', 'data'],
    value:
      "search.ismatch('security OR data OR confidential OR privacy', 'content')",
  },
  {
    keywords: ['vacation', 'pto'],
    value: "search.ismatch('vacation OR pto OR leave OR time off', 'content')",
  },
  {
    keywords: ['policy'],
    value: "search.ismatch('policy OR guideline OR procedure', 'content')",
  },
];

export type HandbookTopic =
  | 'data-security'
  | 'vacation'
  | 'confidentiality'
  | 'remote-work'
  | 'benefits';

export const TOPIC_RULES: readonly KeywordRule<HandbookTopic>[] = [
  {
    keywords: ['data security', 'security policy', 'information security'],
    value: 'data-security',
  },
  { keywords: ['vacation', 'pto', 'time off', 'leave'], value: 'vacation' },
  { keywords: ['confidential', 'confidentiality'], value: 'confidentiality' },
  {
    keywords: ['remote work', 'work from home', 'telework'],
    value: 'remote-work',
  },
  { keywords: ['benefits', 'health', 'insurance'], value: 'benefits' },
];

export const TOPIC_HEADERS: Record<HandbookTopic, string> = {
  'data-security': '**Contoso Data Security Policy Information:**',
  vacation: '**Contoso Vacation and Time Off Policy:**',
  confidentiality: '**Contoso Confidentiality Guidelines:**',
  'remote-work': '**Contoso Remote Work Policy:**',
  benefits: '**Contoso Employee Benefits:**',
};

// Narrower triggers than TOPIC_RULES: "leave" alone picks the vacation
// header but does not trim passages.
export const FOCUS_RULES: readonly KeywordRule<readonly string[]>[] = [
  {
    keywords: ['data security', 'security policy'],
    value: [
      'password',
      'encryption',
      'access',
      'confidential',
      'protect',
      'secure',
      'data handling',
      'classification',
    ],
  },
  {
    keywords: ['vacation', 'pto'],
    value: ['days', 'hours', 'request', 'approval', 'accrual', 'balance', 'holiday'],
  },
];

export function searchFilterFor(query: string): string | undefined {
  return firstMatch(SEARCH_FILTER_RULES, query);
}

export function topicOf(query: string): HandbookTopic | undefined {
  return firstMatch(TOPIC_RULES, query);
}

export function headerFor(query: string): string {
  const topic = topicOf(query);
  const header = topic
    ? TOPIC_HEADERS[topic]
    : `**Information from Contoso Employee Handbook regarding '${query}':**`;
  return `${header}\n\n`;
}

export function focusKeywordsFor(query: string): readonly string[] | undefined {
  return firstMatch(FOCUS_RULES, query);
}
