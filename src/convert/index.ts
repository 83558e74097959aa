/**
 * Conversion engine
 */

export { convert, convertSource, verifyOutput } from "./convert";
export type { ConversionResult, ConversionState } from "./convert";
export { ScopeStack, mangle } from "./context";
export type { ScopeContext, ScopeHandle, ScopeKind } from "./context";
export { extractFunction, extractLambda, extractFromTokens, tokenizeParams } from "./params";
export type { Extraction, ParamName, ParamToken } from "./params";
export { renderDecoratorDefinition, renderDecoratorCall } from "./render";
export { EditSet, applyEdits } from "./rewriter";
export type { DefinitionInsertion, Edit, EditInput, EditOrigin } from "./rewriter";
export { chooseQuote, readDelimiter } from "./string-context";
export type { QuoteChar, StringDelimiter } from "./string-context";
