/**
 * UTCP manual (manifest) type definitions
 *
 * The manual is parsed strictly: a missing required field or an unknown
 * `call_template_type` / `auth_type` fails the load, never the first call.
 */

import { z } from 'zod';

/** Optional field that generated manuals may also write as an explicit `null` */
function optionalOrNull<T extends z.ZodTypeAny>(schema: T) {
    return schema.nullish().transform(value => value ?? undefined);
}

export const HttpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH']);

export const ApiKeyAuthSchema = z.object({
    auth_type:        z.literal('api_key'),
    api_key:          z.string(),
    header_name:      optionalOrNull(z.string()),
    query_param_name: optionalOrNull(z.string()),
});

export const BearerAuthSchema = z.object({
    auth_type: z.literal('bearer'),
    token:     z.string(),
});

export const BasicAuthSchema = z.object({
    auth_type: z.literal('basic'),
    username:  z.string(),
    password:  z.string(),
});

export const AuthSchema = z.discriminatedUnion('auth_type', [
    ApiKeyAuthSchema,
    BearerAuthSchema,
    BasicAuthSchema,
]);

export const HttpCallTemplateSchema = z.object({
    call_template_type: z.literal('http'),
    url:                z.string(),
    http_method:        HttpMethodSchema,
    auth:               optionalOrNull(AuthSchema),
    body_field:         optionalOrNull(z.string()),
    headers:            z.record(z.string(), z.string()).default({}),
});

export const CliCallTemplateSchema = z.object({
    call_template_type:     z.literal('cli'),
    commands:               z.array(z.string()),
    append_to_final_output: z.boolean().default(false),
});

export const CallTemplateSchema = z.discriminatedUnion('call_template_type', [
    HttpCallTemplateSchema,
    CliCallTemplateSchema,
]);

/**
 * JSON Schema documents are kept opaque; consumers derive input forms from
 * them. Any JSON value is accepted, boolean schemas included, but the field
 * must be present.
 */
const JsonSchemaDocumentSchema = z.union([
    z.record(z.string(), z.unknown()),
    z.array(z.unknown()),
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
]);

export const ManifestToolSchema = z.object({
    name:               z.string().min(1, 'Tool name cannot be empty'),
    description:        optionalOrNull(z.string()),
    inputs:             JsonSchemaDocumentSchema,
    outputs:            JsonSchemaDocumentSchema,
    tags:               z.array(z.string()).default([]),
    tool_call_template: CallTemplateSchema,
});

export const ManifestInfoSchema = z.object({
    title:       z.string(),
    version:     z.string(),
    description: optionalOrNull(z.string()),
});

export const ManifestSchema = z.object({
    manual_version: z.string(),
    utcp_version:   z.string(),
    info:           ManifestInfoSchema,
    variables:      z.record(z.string(), z.string()).default({}),
    tools:          z.array(ManifestToolSchema),
});

export type JsonSchemaDocument = z.infer<typeof JsonSchemaDocumentSchema>;
export type HttpMethod = z.infer<typeof HttpMethodSchema>;
export type ApiKeyAuth = z.infer<typeof ApiKeyAuthSchema>;
export type BearerAuth = z.infer<typeof BearerAuthSchema>;
export type BasicAuth = z.infer<typeof BasicAuthSchema>;
export type AuthSpec = z.infer<typeof AuthSchema>;
export type HttpCallTemplate = z.infer<typeof HttpCallTemplateSchema>;
export type CliCallTemplate = z.infer<typeof CliCallTemplateSchema>;
export type CallTemplate = z.infer<typeof CallTemplateSchema>;
export type ManifestTool = z.infer<typeof ManifestToolSchema>;
export type ManifestInfo = z.infer<typeof ManifestInfoSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
