/** Reported by `GET /health` and `--version`. */
export const VERSION = '1.0.0';
