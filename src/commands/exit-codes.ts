import type { RunStatus } from "../types/run.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  PARTIAL_FAILURE: 2,
  INVALID_ARGS: 3,
  PUBLISH_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** A superseded publish is a normal outcome: the newer run publishes. */
export function exitCodeFor(status: RunStatus, finalStage: string): ExitCode {
  switch (status) {
    case "succeeded":
    case "superseded":
      return EXIT.SUCCESS;
    case "partial":
      return EXIT.PARTIAL_FAILURE;
    case "failed":
      return finalStage === "failed_publish" ? EXIT.PUBLISH_FAILED : EXIT.RUN_FAILED;
  }
}
