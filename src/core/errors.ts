import { Failure, FailureKind, OperationOutcome } from "./types.js";

export const NO_OPERATION_MESSAGE = "No operation specified";
export const NO_TEXT_MESSAGE = "No text provided";
export const CANCELLED_MESSAGE = "Operation cancelled";

export function failure(kind: FailureKind, message: string): Failure {
  return { ok: false, kind, message };
}

export function toOutcome(result: { ok: true; text: string } | Failure): OperationOutcome {
  return result.ok ? { success: true, text: result.text } : { success: false, text: result.message };
}

export function timeoutMessage(timeoutSeconds: number): string {
  return `operation timed out after ${timeoutSeconds}s`;
}
