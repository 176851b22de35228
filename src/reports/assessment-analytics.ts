import { AssessmentTaxonomy, categoryName, findCategory, weightedScore } from '../taxonomy/assessment-taxonomy';
import { AssessmentResult } from '../types/assessment';

export interface RankedCategory {
    id: string;
    name: string;
    score: number;
}

export interface CategoryContribution extends RankedCategory {
    weight: number;
    contribution: number;
}

export interface Recommendation {
    category: string;
    score: number;
    impact: number;
    priority: 'High' | 'Medium';
    suggestion: string;
}

export interface AssessmentAnalytics {
    topCategories: RankedCategory[];
    attentionCategories: RankedCategory[];
    contributions: CategoryContribution[];
    recommendations: Recommendation[];
    weightedScore: number | null;
    reportedScore: number;
}

const LOW_SCORE = 60;
const TARGET_SCORE = 75;
const HIGH_PRIORITY_IMPACT = 5;
const HEAVY_WEIGHT = 0.15;
const MAX_RECOMMENDATIONS = 5;

/**
 * Derived insights for the analytics view: best and weakest categories,
 * each category's share of the final score, and where improvement would
 * move the score most.
 */
export function buildAnalytics(result: AssessmentResult, taxonomy: AssessmentTaxonomy): AssessmentAnalytics {
    const ranked: RankedCategory[] = Object.entries(result.categories)
        .map(([id, category]) => ({ id, name: categoryName(taxonomy, id), score: category.score }))
        .sort((a, b) => b.score - a.score);

    const contributions: CategoryContribution[] = [];
    const recommendations: Recommendation[] = [];

    for (const { id, name, score } of ranked) {
        const weight = findCategory(taxonomy, id)?.weight ?? 0;
        contributions.push({ id, name, score, weight, contribution: score * weight });

        if (score < LOW_SCORE) {
            const impact = weight * (LOW_SCORE - score);
            recommendations.push({
                category: name,
                score,
                impact,
                priority: impact > HIGH_PRIORITY_IMPACT ? 'High' : 'Medium',
                suggestion: `Focus on improving ${name.toLowerCase()} as it significantly impacts the overall assessment.`
            });
        } else if (score < TARGET_SCORE && weight > HEAVY_WEIGHT) {
            recommendations.push({
                category: name,
                score,
                impact: weight * (TARGET_SCORE - score),
                priority: 'Medium',
                suggestion: `Enhance ${name.toLowerCase()} to reach the next performance level.`
            });
        }
    }

    recommendations.sort((a, b) => b.impact - a.impact);

    return {
        topCategories: ranked.slice(0, 3),
        attentionCategories: ranked.slice(-3).reverse(),
        contributions,
        recommendations: recommendations.slice(0, MAX_RECOMMENDATIONS),
        weightedScore: weightedScore(taxonomy, result.categories),
        reportedScore: result.final_score
    };
}
