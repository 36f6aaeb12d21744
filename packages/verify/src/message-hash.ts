/**
 * The digest oracles sign: keccak256(keccak256(reportData) ‖ context words).
 */

import { concat, keccak256 } from "viem";
import type { Hex } from "viem";
import type { SignedReport } from "./types.js";

export function reportMessageHash(
  report: Pick<SignedReport, "reportContext" | "reportData">,
): Hex {
  return keccak256(concat([keccak256(report.reportData), ...report.reportContext]));
}
