import { Category, UNCATEGORIZED_LABEL } from './analysis-result.entity';

export enum CategoryDecisionKind {
  MATCHED_EXISTING = 'matched_existing',
  CREATED_NEW = 'created_new',
}

export interface NewCategoryDefinition {
  label: string;
  description: string;
  keywords: string[];
  examples?: string[];
}

/** A category the caller already knows about. */
export interface ExistingCategory {
  label: string;
  description?: string;
  keywords?: string[];
}

export interface CategoryDecision {
  decision: CategoryDecisionKind;
  category: Category;
  existing_label: string | null;
  new_category_def: NewCategoryDefinition | null;
}

/** Decision returned whenever no language model could decide. */
export const fallbackCategoryDecision = (): CategoryDecision => ({
  decision: CategoryDecisionKind.CREATED_NEW,
  category: {
    label: UNCATEGORIZED_LABEL,
    score: 0,
    basis: 'unknown',
    keywords: [],
  },
  existing_label: null,
  new_category_def: {
    label: UNCATEGORIZED_LABEL,
    description: 'no LM available',
    keywords: [],
  },
});
