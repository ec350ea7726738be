// CHANGE: Wire schemas for the three issue payloads accepted by the CLI
// WHY: Payloads arrive as untyped JSON; Schema validates nested flows without hand-written guards
// SOURCE: https://effect.website/docs/schema/introduction
// PURITY: SHELL (boundary validation)
// INVARIANT: Decoded values structurally match the CORE source types
// COMPLEXITY: O(n) where n = payload size

import { Schema } from "effect";

const nullable = <A, I>(schema: Schema.Schema<A, I>) =>
	Schema.optionalWith(Schema.NullOr(schema), { default: () => null });

export const TextRangeSchema = Schema.Struct({
	startLine: Schema.Int,
	startLineOffset: Schema.Int,
	endLine: Schema.Int,
	endLineOffset: Schema.Int,
});

export const TextRangeWithHashSchema = Schema.Struct({
	...TextRangeSchema.fields,
	hash: Schema.String,
});

const LiveLocationSchema = Schema.Struct({
	fileUri: nullable(Schema.String),
	textRange: nullable(TextRangeSchema),
	message: Schema.String,
});

const LiveIssueSchema = Schema.Struct({
	fileUri: nullable(Schema.String),
	message: Schema.String,
	severity: Schema.String,
	ruleKey: Schema.String,
	textRange: nullable(TextRangeSchema),
	flows: Schema.Array(
		Schema.Struct({ locations: Schema.Array(LiveLocationSchema) }),
	),
});

const RemoteLocationSchema = Schema.Struct({
	ideFilePath: Schema.String,
	textRange: nullable(TextRangeSchema),
	codeSnippet: Schema.String,
	message: Schema.String,
});

export const ShowIssueRequestSchema = Schema.Struct({
	ideFilePath: Schema.String,
	message: Schema.String,
	ruleKey: Schema.String,
	textRange: TextRangeSchema,
	codeSnippet: Schema.String,
	creationDate: nullable(Schema.String),
	flows: Schema.Array(
		Schema.Struct({ locations: Schema.Array(RemoteLocationSchema) }),
	),
});

const TaintLocationSchema = Schema.Struct({
	filePath: nullable(Schema.String),
	textRange: nullable(TextRangeWithHashSchema),
	message: Schema.String,
});

export const TaintVulnerabilitySchema = Schema.Struct({
	ideFilePath: Schema.String,
	message: Schema.String,
	severity: Schema.String,
	ruleKey: Schema.String,
	textRange: TextRangeWithHashSchema,
	introductionDate: Schema.Date,
	flows: Schema.Array(
		Schema.Struct({ locations: Schema.Array(TaintLocationSchema) }),
	),
});

export const LiveEnvelopeSchema = Schema.Struct({
	kind: Schema.Literal("live"),
	issue: LiveIssueSchema,
});

export const RemoteEnvelopeSchema = Schema.Struct({
	kind: Schema.Literal("remote"),
	connectionId: nullable(Schema.String),
	request: ShowIssueRequestSchema,
});

export const TaintEnvelopeSchema = Schema.Struct({
	kind: Schema.Literal("taint"),
	connectionId: nullable(Schema.String),
	workspaceFolderUri: nullable(Schema.String),
	taint: TaintVulnerabilitySchema,
});

export const EnvelopeSchema = Schema.Union(
	LiveEnvelopeSchema,
	RemoteEnvelopeSchema,
	TaintEnvelopeSchema,
);

/**
 * A single envelope or a batch of envelopes sharing one cache.
 */
export const InputPayloadSchema = Schema.Union(
	EnvelopeSchema,
	Schema.Array(EnvelopeSchema),
);

export type Envelope = typeof EnvelopeSchema.Type;
export type LiveIssuePayload = typeof LiveIssueSchema.Type;
export type InputPayload = typeof InputPayloadSchema.Type;
