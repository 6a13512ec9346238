/** Version stamped on every JSON report and error produced by this package. */
export const WHEELWRIGHT_REPORT_SCHEMA_VERSION = '1';
