export { FileStatementProvider } from "./fileStatementProvider";
export { HttpStatementProvider } from "./httpStatementProvider";
export type { HttpStatementProviderOptions } from "./httpStatementProvider";
export { RawStatementRowSchema, StatementsFileSchema, StatementsPayloadSchema, toRawStatements } from "./payload";
export type { StatementsPayload } from "./payload";
