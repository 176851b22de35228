/**
 * Assessment Taxonomy
 *
 * The fixed rubric every interview is scored against. Category weights sum
 * to 1.0 and drive the weighted final score. Read-only and shared by every
 * pipeline run.
 */

export interface AssessmentCategory {
    readonly id: string;
    readonly name: string;
    readonly weight: number;
    readonly subcategories: Readonly<Record<string, string>>;
}

export type AssessmentTaxonomy = ReadonlyArray<AssessmentCategory>;

export const WEIGHT_TOLERANCE = 1e-9;

const TAXONOMY_CATEGORIES: AssessmentCategory[] = [
    {
        id: 'technical_skills',
        name: 'Technical Skills',
        weight: 0.3,
        subcategories: {
            core_knowledge: 'Understanding of domain-specific concepts',
            problem_solving: 'Approach to solving technical problems',
            coding_skills: 'Proficiency in programming languages',
            tools_technologies: 'Familiarity with industry-standard tools'
        }
    },
    {
        id: 'communication_skills',
        name: 'Communication Skills',
        weight: 0.2,
        subcategories: {
            clarity: 'Ability to express thoughts clearly',
            listening: 'Understanding and responding appropriately',
            conciseness: 'Being to the point without unnecessary details',
            nonverbal: 'Body language and overall presence'
        }
    },
    {
        id: 'behavioral_skills',
        name: 'Behavioral & Soft Skills',
        weight: 0.15,
        subcategories: {
            leadership: 'Leadership potential and teamwork abilities',
            adaptability: 'Flexibility in handling different situations',
            problem_solving_mindset: 'Approach to challenges',
            emotional_intelligence: 'Handling stress and feedback'
        }
    },
    {
        id: 'strengths_weaknesses',
        name: 'Strengths & Weaknesses',
        weight: 0.1,
        subcategories: {
            self_awareness: 'Understanding of capabilities and gaps',
            improvement_mindset: 'How weaknesses are addressed'
        }
    },
    {
        id: 'cultural_fit',
        name: 'Cultural Fit & Attitude',
        weight: 0.1,
        subcategories: {
            values_alignment: 'Alignment with company values',
            growth_mindset: 'Willingness to learn and improve',
            work_ethic: 'Dedication and responsibility'
        }
    },
    {
        id: 'critical_thinking',
        name: 'Problem-Solving & Critical Thinking',
        weight: 0.1,
        subcategories: {
            logical_thinking: 'Structured approach to problem-solving',
            creativity: 'Ability to think out of the box'
        }
    },
    {
        id: 'decision_making',
        name: 'Decision-Making Ability',
        weight: 0.05,
        subcategories: {
            analytical_thinking: 'Weighing pros and cons',
            pressure_handling: 'Making sound decisions under stress'
        }
    }
];

export const ASSESSMENT_TAXONOMY: AssessmentTaxonomy = Object.freeze(
    TAXONOMY_CATEGORIES.map(category => Object.freeze({ ...category, subcategories: Object.freeze(category.subcategories) }))
);

export function totalWeight(taxonomy: AssessmentTaxonomy): number {
    return taxonomy.reduce((sum, category) => sum + category.weight, 0);
}

export function isBalanced(taxonomy: AssessmentTaxonomy, tolerance: number = WEIGHT_TOLERANCE): boolean {
    return Math.abs(totalWeight(taxonomy) - 1) <= tolerance;
}

export function findCategory(taxonomy: AssessmentTaxonomy, id: string): AssessmentCategory | undefined {
    return taxonomy.find(category => category.id === id);
}

/**
 * Display name for a category id, falling back to the id itself.
 */
export function categoryName(taxonomy: AssessmentTaxonomy, id: string): string {
    return findCategory(taxonomy, id)?.name ?? id;
}

/**
 * Taxonomy in the keyed shape embedded in prompts and returned by the API.
 */
export function taxonomyToRecord(taxonomy: AssessmentTaxonomy): Record<string, Omit<AssessmentCategory, 'id'>> {
    const record: Record<string, Omit<AssessmentCategory, 'id'>> = {};
    for (const { id, ...rest } of taxonomy) {
        record[id] = rest;
    }
    return record;
}

/**
 * Weighted average of the given category scores, normalised by the weights
 * of the categories actually present. Unknown ids are ignored; returns null
 * when nothing can be weighted.
 */
export function weightedScore(
    taxonomy: AssessmentTaxonomy,
    categories: Readonly<Record<string, { score: number }>>
): number | null {
    let weighted = 0;
    let weights = 0;
    for (const [id, assessment] of Object.entries(categories)) {
        const category = findCategory(taxonomy, id);
        if (!category) continue;
        weighted += assessment.score * category.weight;
        weights += category.weight;
    }
    return weights > 0 ? weighted / weights : null;
}
