/**
 * Debug flags for development. Defaults must be false for production.
 */

/** When true, the dashboard shows the raw projection payload under the report. */
export const DEBUG_PROJECTION = false;
