/**
 * Output barrel: dashboard rendering and console reporting.
 */

export type { DashboardHandle, DashboardOptions, TextSink } from './ui.tsx';
export { renderDashboard } from './ui.tsx';
export type { OutputConsole, Reporter, ReporterOptions } from './reporter.ts';
export { createReporter } from './reporter.ts';
