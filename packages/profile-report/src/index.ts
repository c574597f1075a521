/**
 * @profile-eval/report
 *
 * Renders test runs from @profile-eval/validation as JSON data or
 * terminal text. Renderers never recompute scores.
 */

export { toJsonReport, formatJsonReport, toJsonValue } from './json-report';
export type { JsonReport, JsonBackendResult, JsonFieldResult, JsonValue } from './json-report';
export { formatTextReport } from './text-report';
export type { TextReportOptions } from './text-report';
