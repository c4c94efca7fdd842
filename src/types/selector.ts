export type SelectorKind = 'css' | 'xpath';

export type GeneralizationStrategy =
  | 'tag-class'
  | 'class-only'
  | 'parent-child'
  | 'numeric-suffix'
  | 'path-truncation'
  | 'pseudo-class'
  | 'tag-only';

export interface SelectorCandidate {
  selector: string;
  count: number;
  confidence: number;
  strategy: GeneralizationStrategy;
}

export interface GeneralizationResult {
  success: boolean;
  originalSelector: string;
  generalizedSelector: string;
  selectorType: SelectorKind;
  matchedCount: number;
  candidates: SelectorCandidate[];
  error?: string;
}
