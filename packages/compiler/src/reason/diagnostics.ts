export const TRANSLATE_DIAGNOSTIC_CODES = ["RBD1001", "RBD1002"] as const;

export type TranslateDiagnosticCode = (typeof TRANSLATE_DIAGNOSTIC_CODES)[number];

export type TranslateDiagnosticDomain = "naming" | "constructor";

const knownCodes: ReadonlySet<string> = new Set(TRANSLATE_DIAGNOSTIC_CODES);

export function isTranslateDiagnosticCode(code: string): code is TranslateDiagnosticCode {
  return knownCodes.has(code);
}

export function assertTranslateDiagnosticCode(code: string): asserts code is TranslateDiagnosticCode {
  if (!isTranslateDiagnosticCode(code)) {
    throw new Error(`Unknown translate diagnostic code: ${code}`);
  }
}

export function translateDiagnosticDomain(code: TranslateDiagnosticCode): TranslateDiagnosticDomain {
  switch (code) {
    case "RBD1001":
      return "naming";
    case "RBD1002":
      return "constructor";
  }
}

export class TranslateError extends Error {
  readonly code: TranslateDiagnosticCode;

  constructor(code: string, message: string) {
    super(message);
    assertTranslateDiagnosticCode(code);
    this.code = code;
    this.name = "TranslateError";
  }
}
