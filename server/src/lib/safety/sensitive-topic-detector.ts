import * as z from 'zod';
import sensitiveTopics from '../../data/sensitive-topics.json';
import { ReplyTone, RiskLevel, SensitiveAnalysis, SensitiveCategory } from '../../types/reply';

export const SENSITIVE_CATEGORIES: readonly SensitiveCategory[] = [
  'legal',
  'hr_personnel',
  'financial_sensitive',
  'confidential',
  'crisis',
  'ethical'
];

const RISK_ORDER: readonly RiskLevel[] = ['low', 'medium', 'high', 'critical'];

const templateSchema = z.object({
  formal: z.string(),
  business: z.string(),
  casual: z.string()
});

const topicsSchema = z.object({
  categories: z.record(z.object({
    risk: z.enum(['low', 'medium', 'high', 'critical']),
    keywords: z.array(z.string()).min(1)
  })),
  templates: z.record(templateSchema)
});

export type SensitiveTopics = z.infer<typeof topicsSchema>;

interface CompiledCategory {
  category: SensitiveCategory;
  risk: RiskLevel;
  pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SensitiveTopicDetector {
  private compiled: CompiledCategory[];
  private templates: SensitiveTopics['templates'];

  constructor(topics: unknown = sensitiveTopics) {
    const parsed = topicsSchema.parse(topics);
    this.templates = parsed.templates;
    this.compiled = SENSITIVE_CATEGORIES.flatMap(category => {
      const entry = parsed.categories[category];
      if (!entry) {
        return [];
      }
      const alternatives = entry.keywords.map(keyword => escapeRegExp(keyword.toLowerCase())).join('|');
      return [{ category, risk: entry.risk, pattern: new RegExp(`\\b(?:${alternatives})\\b`, 'gi') }];
    });
  }

  detect(subject: string, body: string): SensitiveAnalysis {
    const text = `${subject} ${body}`.toLowerCase();
    const categories: SensitiveCategory[] = [];
    const keywords = new Set<string>();
    let risk: RiskLevel = 'low';

    for (const { category, risk: categoryRisk, pattern } of this.compiled) {
      const matches = text.match(pattern);
      if (!matches) {
        continue;
      }
      categories.push(category);
      matches.forEach(match => keywords.add(match));
      if (RISK_ORDER.indexOf(categoryRisk) > RISK_ORDER.indexOf(risk)) {
        risk = categoryRisk;
      }
    }

    const isSensitive = categories.length > 0;
    const riskLevel: RiskLevel = isSensitive && risk === 'low' ? 'medium' : risk;
    return Object.freeze({
      isSensitive,
      categories,
      matchedKeywords: [...keywords],
      riskLevel,
      requiresManualReview: riskLevel === 'high' || riskLevel === 'critical'
    });
  }

  /**
   * Conservative holding reply for the riskiest matched category
   */
  safeModeBody(analysis: SensitiveAnalysis, tone: ReplyTone): string {
    const ranked = [...analysis.categories].sort((a, b) => this.riskRank(b) - this.riskRank(a));
    for (const category of ranked) {
      const template = this.templates[category];
      if (template) {
        return template[tone];
      }
    }
    return 'Thank you for your email. I will review it carefully and respond within two business days.';
  }

  private riskRank(category: SensitiveCategory): number {
    const entry = this.compiled.find(compiled => compiled.category === category);
    return entry ? RISK_ORDER.indexOf(entry.risk) : 0;
  }
}
