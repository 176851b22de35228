import { z } from 'zod';
import { AssessmentTaxonomy, findCategory } from '../taxonomy/assessment-taxonomy';
import { AssessmentPayload, ROLE_FIT_RATINGS } from '../types/assessment';

const scoreSchema = z.number().finite().min(0).max(100);

const categoryAssessmentSchema = z.object({
    score: scoreSchema,
    observations: z.array(z.string()),
    assessment: z.string(),
    subcategories: z.record(z.string(), scoreSchema).optional()
});

/**
 * Schema for the model's reply, bound to a taxonomy so that category and
 * subcategory keys outside the rubric are rejected.
 */
export function buildAssessmentPayloadSchema(taxonomy: AssessmentTaxonomy) {
    return z.object({
        summary: z.string().min(1),
        categories: z
            .record(z.string(), categoryAssessmentSchema)
            .superRefine((categories, ctx) => {
                const ids = Object.keys(categories);
                if (ids.length === 0) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: 'At least one category must be assessed'
                    });
                }
                for (const id of ids) {
                    const category = findCategory(taxonomy, id);
                    if (!category) {
                        ctx.addIssue({
                            code: z.ZodIssueCode.custom,
                            path: [id],
                            message: `Unknown category "${id}"`
                        });
                        continue;
                    }
                    for (const subId of Object.keys(categories[id].subcategories ?? {})) {
                        if (!Object.prototype.hasOwnProperty.call(category.subcategories, subId)) {
                            ctx.addIssue({
                                code: z.ZodIssueCode.custom,
                                path: [id, 'subcategories', subId],
                                message: `Unknown subcategory "${subId}" for category "${id}"`
                            });
                        }
                    }
                }
            }),
        strengths: z.array(z.string()),
        improvements: z.array(z.string()),
        role_fit: z.object({
            rating: z.enum(ROLE_FIT_RATINGS),
            justification: z.string()
        }),
        final_score: scoreSchema
    });
}

export type PayloadValidation =
    | { ok: true; payload: AssessmentPayload }
    | { ok: false; issues: string[] };

export function validateAssessmentPayload(value: unknown, taxonomy: AssessmentTaxonomy): PayloadValidation {
    const parsed = buildAssessmentPayloadSchema(taxonomy).safeParse(value);
    if (!parsed.success) {
        return {
            ok: false,
            issues: parsed.error.issues.map(issue => {
                const path = issue.path.join('.');
                return path ? `${path}: ${issue.message}` : issue.message;
            })
        };
    }
    return { ok: true, payload: parsed.data };
}
