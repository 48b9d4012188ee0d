import type { PullRequestSourceId, PullRequestSummary } from "@authorscope/core";
import { buildRemediationHints } from "../domain/remediation.js";
import type {
  PullRequestCountContext,
  PullRequestCountResolution,
  PullRequestCountSource,
} from "../domain/types.js";

export type PullRequestCountProgressEvent =
  | { stage: "source_started"; source: PullRequestSourceId }
  | { stage: "source_unavailable"; source: PullRequestSourceId; reason: string }
  | { stage: "source_resolved"; source: PullRequestSourceId; count: number }
  | { stage: "count_unknown"; remediation: readonly string[] };

const attempt = async (
  source: PullRequestCountSource,
  context: PullRequestCountContext,
): Promise<PullRequestCountResolution> => {
  try {
    return await source.tryResolve(context);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: "unavailable", reason: `unexpected failure: ${message}` };
  }
};

/**
 * Walks the sources in order and stops at the first definite count, zero included.
 * When none can answer, the count is `unknown` and remediation hints are attached.
 */
export const countPullRequests = async (
  context: PullRequestCountContext,
  sources: readonly PullRequestCountSource[],
  onProgress?: (event: PullRequestCountProgressEvent) => void,
): Promise<PullRequestSummary> => {
  for (const source of sources) {
    onProgress?.({ stage: "source_started", source: source.id });
    const resolution = await attempt(source, context);
    if (resolution.status === "resolved") {
      onProgress?.({ stage: "source_resolved", source: source.id, count: resolution.count });
      return {
        identity: context.identity,
        count: resolution.count,
        source: source.id,
        remediation: [],
      };
    }

    onProgress?.({ stage: "source_unavailable", source: source.id, reason: resolution.reason });
  }

  const remediation = buildRemediationHints(context);
  onProgress?.({ stage: "count_unknown", remediation });
  return {
    identity: context.identity,
    count: "unknown",
    source: null,
    remediation,
  };
};
