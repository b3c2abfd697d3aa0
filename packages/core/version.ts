/** The version reported by the CLI and attached to metrics */
export const SQL_DRILL_VERSION = "0.1.0"
