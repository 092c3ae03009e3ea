/**
 * Personal-data redaction for extracted sections
 */

export { scrubIdentifiers, type RedactionReport } from './redaction.js';
export { createRedactor, REDACTOR_AGENT, type Redactor, type RedactorDeps, type RedactionOutcome } from './redactor.js';
