/**
 * Manifest schema and parser
 *
 * A manifest file is a multi-document YAML stream; every document declares one
 * resource as `{ kind, spec }`.
 */

import { parseAllDocuments } from 'yaml'
import { z } from 'zod'
import { ManifestParseError } from '../lib/errors.js'
import {
  defineResource,
  normalizePath,
  type IssuerSpec,
  type PasswordPolicySpec,
  type PasswordSpec,
  type PKIRoleSpec,
  type Resource,
  type SecretsEngineSpec,
  type SSHKeySpec
} from './types.js'

// ============================================================================
// Schemas
// ============================================================================

// Leading, trailing and repeated slashes are dropped
const pathSchema = z.string().transform(normalizePath).pipe(
  z.string().min(1, 'must contain at least one path segment')
)

const encodingSchema = z.enum(['utf8', 'base64']).default('utf8')
const versionSchema = z.number().int().min(1)

const tuneConfigSchema = z.object({
  defaultLeaseTtl: z.string().optional(),
  maxLeaseTtl: z.string().optional(),
  auditNonHmacRequestKeys: z.array(z.string()).optional(),
  auditNonHmacResponseKeys: z.array(z.string()).optional(),
  listingVisibility: z.enum(['unauth', 'hidden']).optional(),
  passthroughRequestHeaders: z.array(z.string()).optional(),
  allowedResponseHeaders: z.array(z.string()).optional()
}).strict()

const engineCommon = {
  description: z.string().optional(),
  local: z.boolean().optional(),
  sealWrap: z.boolean().optional(),
  externalEntropyAccess: z.boolean().optional(),
  config: tuneConfigSchema.optional()
}

export const SecretsEngineSpecSchema: z.ZodType<SecretsEngineSpec, z.ZodTypeDef, unknown> = z.object({
  path: pathSchema,
  engine: z.discriminatedUnion('type', [
    z.object({
      type: z.literal('kv-v2'),
      ...engineCommon,
      maxVersions: z.number().int().nonnegative().optional(),
      casRequired: z.boolean().optional(),
      deleteVersionAfter: z.string().optional()
    }).strict(),
    z.object({
      type: z.literal('pki'),
      ...engineCommon
    }).strict()
  ])
}).strict()

export const PasswordPolicySpecSchema: z.ZodType<PasswordPolicySpec, z.ZodTypeDef, unknown> = z.object({
  path: pathSchema,
  policy: z.object({
    length: z.number().int().min(4).max(100),
    rules: z.array(z.object({
      charset: z.string().min(1),
      minChars: z.number().int().nonnegative().optional()
    }).strict()).min(1)
  }).strict().superRefine((policy, ctx) => {
    const required = policy.rules.reduce((sum, rule) => sum + (rule.minChars ?? 0), 0)
    if (required > policy.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rules'],
        message: `minChars add up to ${required}, more than length ${policy.length}`
      })
    }
  })
}).strict()

export const PasswordSpecSchema: z.ZodType<PasswordSpec, z.ZodTypeDef, unknown> = z.object({
  secretsEnginePath: pathSchema,
  path: pathSchema,
  secretKey: z.string().min(1),
  policyPath: pathSchema,
  version: versionSchema,
  encoding: encodingSchema
}).strict()

export const SSHKeySpecSchema: z.ZodType<SSHKeySpec, z.ZodTypeDef, unknown> = z.object({
  secretsEnginePath: pathSchema,
  path: pathSchema,
  version: versionSchema,
  encoding: encodingSchema,
  keyOptions: z.discriminatedUnion('type', [
    z.object({
      type: z.literal('rsa'),
      bits: z.union([z.literal(2048), z.literal(3072), z.literal(4096)]).optional()
    }).strict(),
    z.object({
      type: z.literal('ec'),
      curve: z.enum(['prime256v1', 'secp384r1', 'secp521r1'])
    }).strict(),
    z.object({ type: z.literal('ed25519') }).strict()
  ]),
  privateKey: z.object({ secretKey: z.string().min(1).optional() }).strict().optional(),
  publicKey: z.object({ secretKey: z.string().min(1).optional() }).strict().optional()
}).strict()

export const IssuerSpecSchema: z.ZodType<IssuerSpec, z.ZodTypeDef, unknown> = z.object({
  secretsEnginePath: pathSchema,
  name: z.string().min(1),
  certificate: z.object({
    type: z.enum(['internal', 'exported', 'existing', 'kms']),
    commonName: z.string().min(1),
    altNames: z.string().optional(),
    ipSans: z.string().optional(),
    uriSans: z.string().optional(),
    ttl: z.string().optional(),
    maxPathLength: z.number().int().optional(),
    keyType: z.enum(['rsa', 'ec', 'ed25519']).optional(),
    keyBits: z.number().int().nonnegative().optional(),
    organization: z.string().optional(),
    ou: z.string().optional(),
    country: z.string().optional(),
    locality: z.string().optional(),
    province: z.string().optional(),
    notAfter: z.string().optional()
  }).strict(),
  options: z.object({
    leafNotAfterBehavior: z.enum(['err', 'truncate', 'permit']).optional(),
    usage: z.string().optional(),
    manualChain: z.array(z.string()).optional(),
    revocationSignatureAlgorithm: z.string().optional(),
    issuingCertificates: z.array(z.string()).optional(),
    crlDistributionPoints: z.array(z.string()).optional(),
    ocspServers: z.array(z.string()).optional(),
    enableAiaUrlTemplating: z.boolean().optional()
  }).strict().optional(),
  chaining: z.object({
    upstreamIssuerRef: pathSchema,
    addBasicConstraints: z.boolean().optional(),
    signatureBits: z.number().int().optional(),
    skid: z.string().optional(),
    usePss: z.boolean().optional()
  }).strict().optional()
}).strict()

export const PKIRoleSpecSchema: z.ZodType<PKIRoleSpec, z.ZodTypeDef, unknown> = z.object({
  secretsEnginePath: pathSchema,
  name: z.string().min(1),
  role: z.object({
    issuerRef: pathSchema,
    ttl: z.string().optional(),
    maxTtl: z.string().optional(),
    allowLocalhost: z.boolean().optional(),
    allowedDomains: z.array(z.string()).optional(),
    allowBareDomains: z.boolean().optional(),
    allowSubdomains: z.boolean().optional(),
    allowGlobDomains: z.boolean().optional(),
    allowWildcardCertificates: z.boolean().optional(),
    allowAnyName: z.boolean().optional(),
    enforceHostnames: z.boolean().optional(),
    allowIpSans: z.boolean().optional(),
    serverFlag: z.boolean().optional(),
    clientFlag: z.boolean().optional(),
    codeSigningFlag: z.boolean().optional(),
    keyType: z.enum(['rsa', 'ec', 'ed25519', 'any']).optional(),
    keyBits: z.number().int().nonnegative().optional(),
    keyUsage: z.array(z.string()).optional(),
    extKeyUsage: z.array(z.string()).optional(),
    organization: z.array(z.string()).optional(),
    ou: z.array(z.string()).optional(),
    country: z.array(z.string()).optional(),
    noStore: z.boolean().optional(),
    requireCn: z.boolean().optional(),
    notBeforeDuration: z.string().optional()
  }).strict()
}).strict()

export const ManifestDocumentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('SecretsEngine'), spec: SecretsEngineSpecSchema }).strict(),
  z.object({ kind: z.literal('PasswordPolicy'), spec: PasswordPolicySpecSchema }).strict(),
  z.object({ kind: z.literal('Issuer'), spec: IssuerSpecSchema }).strict(),
  z.object({ kind: z.literal('PKIRole'), spec: PKIRoleSpecSchema }).strict(),
  z.object({ kind: z.literal('SSHKey'), spec: SSHKeySpecSchema }).strict(),
  z.object({ kind: z.literal('Password'), spec: PasswordSpecSchema }).strict()
])

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>

// ============================================================================
// Parsing
// ============================================================================

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

/**
 * Parse one manifest file into resources.
 *
 * Empty documents are skipped; the first invalid document aborts with a
 * ManifestParseError naming the file and the document.
 */
export function parseManifest(text: string, file: string): Resource[] {
  const resources: Resource[] = []

  parseAllDocuments(text).forEach((doc, index) => {
    if (doc.errors.length > 0) {
      throw new ManifestParseError(file, doc.errors.map(error => error.message), index)
    }

    const data: unknown = doc.toJS()
    if (data === null || data === undefined) {
      return
    }

    const result = ManifestDocumentSchema.safeParse(data)
    if (!result.success) {
      throw new ManifestParseError(file, result.error.issues.map(formatIssue), index)
    }

    resources.push(defineResource(result.data, { file, document: index }))
  })

  return resources
}
