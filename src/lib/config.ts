export const config = {
  debugMatching: process.env.MPN_DEBUG === "true",
  logPrefix: process.env.MPN_LOG_PREFIX || "mpn",
  logTag(scope: string): string {
    return `[${this.logPrefix}:${scope}]`;
  },
};
