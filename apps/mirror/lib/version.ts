/** Reported by `--version` and the `fanmirror_run_info` metric. */
export const VERSION = '0.1.0'
