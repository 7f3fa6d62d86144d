import type { CategoryDefinition } from './JobConfig.js';

/**
 * Label set for AI-in-education survey responses.
 *
 * Descriptions are shown verbatim to the model.
 */

export const CHEATING_CONCERNS: CategoryDefinition = {
  label: 'Cheating Concerns',
  description: 'Mentions of academic dishonesty, misuse',
};

export const POSITIVE_LEARNING_USE: CategoryDefinition = {
  label: 'Positive Learning Use',
  description: 'Says AI helped them understand/study',
};

export const NEGATIVE_EXPERIENCES: CategoryDefinition = {
  label: 'Negative Experiences',
  description: 'Confusing, inaccurate, unhelpful',
};

export const OVERRELIANCE: CategoryDefinition = {
  label: 'Overreliance',
  description: 'Worries about becoming lazy or dependent',
};

export const TRUST_ISSUES: CategoryDefinition = {
  label: 'Trust Issues',
  description: 'Doesn’t trust responses; always double-checks',
};

export const POLICY_SCHOOL_RULES: CategoryDefinition = {
  label: 'Policy/School Rules',
  description: 'Mentions bans, restrictions, teacher feedback',
};

export const MIXED_VIEWS: CategoryDefinition = {
  label: 'Mixed Views',
  description: 'Likes AI but has concerns',
};

export const ETHICAL_PRIVACY_CONCERNS: CategoryDefinition = {
  label: 'Ethical/Privacy Concerns',
  description: 'Worries about AI’s effect on society/privacy',
};

export const NO_USE: CategoryDefinition = {
  label: 'No Use',
  description: '“I don’t use AI” or “never used it”',
};

export const OTHER: CategoryDefinition = {
  label: 'Other',
  description: 'Doesn’t fit above or is off-topic',
};
