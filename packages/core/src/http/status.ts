/** Reason phrases for the status codes the framework produces itself. */
const STATUS_TEXT: Record<number, string> = {
	101: "Switching Protocols",
	200: "OK",
	201: "Created",
	204: "No Content",
	301: "Moved Permanently",
	302: "Found",
	304: "Not Modified",
	307: "Temporary Redirect",
	308: "Permanent Redirect",
	400: "Bad Request",
	401: "Unauthorized",
	403: "Forbidden",
	404: "Not Found",
	405: "Method Not Allowed",
	408: "Request Timeout",
	409: "Conflict",
	413: "Payload Too Large",
	415: "Unsupported Media Type",
	422: "Unprocessable Entity",
	426: "Upgrade Required",
	429: "Too Many Requests",
	499: "Client Closed Request",
	500: "Internal Server Error",
	502: "Bad Gateway",
	503: "Service Unavailable",
	504: "Gateway Timeout",
};

/** Reason phrase for `status`, or `HTTP <status>` for codes outside the table. */
export function statusText(status: number): string {
	return STATUS_TEXT[status] ?? `HTTP ${status}`;
}
