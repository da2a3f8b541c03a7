export type { Artifact, EncodedField, EncodedParam, EncodedVariant } from "./reason/write.js";
export { renderArtifactFile } from "./reason/write.js";
export type { TranslateDiagnosticCode, TranslateDiagnosticDomain } from "./reason/diagnostics.js";
export { TRANSLATE_DIAGNOSTIC_CODES, TranslateError, translateDiagnosticDomain } from "./reason/diagnostics.js";
export { dedupe, normalizeIdentifier } from "./reason/common.js";
export { typeName } from "./reason/naming.js";
export { UNTRANSLATABLE_MARKER, encodeType } from "./reason/type-encoding.js";
export type { PrecodeOptions } from "./reason/precode.js";
export { declPrecode, renderPrecode, typePrecode } from "./reason/precode.js";
export { constructorTypeOf, resolveConstructorType } from "./reason/constructor.js";
export { UNSUPPORTED_DECLARATION_MARKER, emitDecl } from "./reason/declaration-emission.js";
export type { TranslateOptions } from "./reason/translate.js";
export { translate } from "./reason/translate.js";
