import type { FlagAnnotation, SkillAnnotation } from '@/lib/evidence';
import { isSeverity, MULTIPLE_COLOR, SEVERITY_STYLES, SKILL_CATEGORY_STYLES } from './styleTables';
import type { StylePolicy } from './types';

/**
 * Content flags, colored by severity. Unknown severities use the Low style.
 */
export const severityPolicy: StylePolicy<FlagAnnotation> = {
    name: 'severity',
    styleFor: ({ annotation }) =>
        isSeverity(annotation.severity) ? SEVERITY_STYLES[annotation.severity] : SEVERITY_STYLES.Low,
    describe: ({ annotation }) => `${annotation.severity}: ${annotation.label}`,
    describeInMultiple: ({ annotation }) => `${annotation.severity}: ${annotation.label}`,
    multiple: {
        color: MULTIPLE_COLOR,
        className: 'flag-multiple',
        titlePrefix: 'Multiple issues - ',
    },
};

/**
 * Reading skills, colored by the skill's category.
 */
export const skillCategoryPolicy: StylePolicy<SkillAnnotation> = {
    name: 'skill-category',
    styleFor: ({ annotation }) => SKILL_CATEGORY_STYLES[annotation.category],
    describe: ({ annotation }) =>
        `${annotation.category}: ${annotation.skillName} (confidence: ${annotation.confidence.toFixed(2)})`,
    describeInMultiple: ({ annotation }) => `${annotation.category}: ${annotation.skillName}`,
    multiple: {
        color: MULTIPLE_COLOR,
        className: 'skill-multiple',
        titlePrefix: 'Multiple skills - ',
    },
};
