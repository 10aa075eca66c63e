export const SKILL_LABELS = ['novice', 'intermediate', 'expert'] as const;

/** Ordered by difficulty intent: novice < intermediate < expert. */
export type SkillLabel = (typeof SKILL_LABELS)[number];

export const isSkillLabel = (value: unknown): value is SkillLabel => {
    return typeof value === 'string' && SKILL_LABELS.some((label) => label === value);
};
