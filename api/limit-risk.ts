/**
 * ============================================================================
 * api/limit-risk.ts
 * Limit-risk scoring endpoint.
 *
 * POST { csv } -> metrics, risk profile, chart series, cleaned rows.
 * Every request is an isolated pass; nothing is cached or stored.
 * ============================================================================
 */

import type { NextApiRequest, NextApiResponse, PageConfig } from "next";

import { AnalyzeRequestSchema } from "../lib/schemas/wagerSchema";
import { analyzeCsv } from "../lib/analyze";
import { env } from "../lib/env";
import { logger } from "../lib/logger";

// The JSON body carries the CSV escaped, so the parser gets headroom over the
// upload cap; handleAnalyzeRequest enforces the exact byte limit.
export const config = {
    api: {
        bodyParser: { sizeLimit: env.MAX_UPLOAD_BYTES * 2 },
    },
} satisfies PageConfig;

export interface HandlerResponse {
    status: number;
    body: Record<string, unknown>;
}

/**
 * Transport-independent request handling. Never throws.
 */
export function handleAnalyzeRequest(
    method: string | undefined,
    payload: unknown,
    maxBytes: number = env.MAX_UPLOAD_BYTES
): HandlerResponse {
    if (method !== "POST") return { status: 405, body: { error: "Method not allowed" } };

    const parsedReq = AnalyzeRequestSchema.safeParse(payload);
    if (!parsedReq.success) {
        return { status: 400, body: { error: "Invalid payload format", details: parsedReq.error.format() } };
    }

    const { csv } = parsedReq.data;
    if (Buffer.byteLength(csv, "utf8") > maxBytes) {
        return { status: 413, body: { error: `Upload exceeds ${maxBytes} bytes` } };
    }

    try {
        const result = analyzeCsv(csv);
        switch (result.status) {
            case "missing_columns":
                return {
                    status: 422,
                    body: { ...result, error: `Missing required columns: ${result.missing.join(", ")}` },
                };
            case "no_valid_rows":
                return {
                    status: 422,
                    body: { ...result, error: "No valid rows after cleaning. Check your CSV formatting." },
                };
            case "ok":
                return { status: 200, body: { ...result } };
        }
    } catch (err) {
        logger.error("LimitRiskAPI", "Unexpected failure", err);
        return { status: 500, body: { error: "Analysis temporarily unavailable." } };
    }
}

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
    const { status, body } = handleAnalyzeRequest(req.method, req.body);
    if (status === 405) res.setHeader("Allow", "POST");
    return res.status(status).json(body);
}
