/**
 * Embedding Text Generator
 *
 * Turns a repository record into the single line of text that gets embedded.
 * Same record in, same text out; build checkpoints are keyed on these texts.
 */

import type { RepoRecord } from '../../../../shared/models/RepoRecord.js';

const LIST_SEPARATOR = ', ';

function formatList(values: readonly string[]): string {
    return values.length > 0 ? values.join(LIST_SEPARATOR) : 'None';
}

/**
 * `Repository: … | Organization: … | Description: … | …`
 */
export function generateRecordEmbeddingText(record: RepoRecord): string {
    const parts = [
        `Repository: ${record.repository}`,
        `Organization: ${record.organization}`,
        `Description: ${record.description}`,
        `Solution Type: ${record.solutionType}`,
        `Competency: ${record.competency}`,
        `Primary Language: ${record.primaryLanguage}`,
        `AWS Services: ${formatList(record.awsServices)}`,
        `Deployment Tools: ${formatList(record.deploymentTools)}`,
        `Cost Range: ${record.costRange}`,
        `Topics: ${formatList(record.topics)}`,
    ];

    return parts.join(' | ');
}

export function generateEmbeddingTexts(records: readonly RepoRecord[]): string[] {
    return records.map(generateRecordEmbeddingText);
}
