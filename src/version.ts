export const VERSION = "0.1.0";

/** Sent when neither the request nor the client defaults set "user-agent" */
export const USER_AGENT = `pooled-http-dispatch/${VERSION}`;
