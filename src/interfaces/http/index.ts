export { default as errorReportingPlugin } from './error-reporting-plugin.js';
export type { ErrorReportingPluginOptions } from './error-reporting-plugin.js';
