/**
 * Configuration types. Every field has a default so that compilation and
 * local runs work with an empty configuration.
 */

import { z } from 'zod';
import { RetryPolicySchema } from './step.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  /** 'human' lines or one JSON object per line */
  format: z.enum(['human', 'json']).default('human'),
  showTimestamps: z.boolean().default(true),
  /** Fan-out progress is reported every N percent */
  progressInterval: z.number().int().min(1).max(100).default(10),
});

export type LoggingConfig = z.output<typeof LoggingConfigSchema>;

const StringMapSchema = z.record(z.string(), z.string());

export const AwsConfigSchema = z.object({
  /** Bucket for manifests and intermediate results; empty reads it from the execution input */
  artifactBucket: z.string().default(''),
  region: z.string().default('us-east-1'),
  /** Endpoint override for local emulation */
  endpoint: z.string().default(''),
  imageRepository: z.string().default(''),
  /** Key prefix for everything the flows write */
  storagePrefix: z.string().min(1).default('stepline'),
});

export const LambdaConfigSchema = z.object({
  timeout: z.number().int().positive().default(900),
  memory: z.number().int().positive().default(512),
  imageTag: z.string().default('latest'),
  /** Mustache template for the deployed function name ({{flow}}, {{step}}) */
  functionName: z.string().min(1).default('{{flow}}-{{step}}'),
  env: StringMapSchema.default({}),
});

export const BatchConfigSchema = z.object({
  /** Mustache template for the job queue ({{flow}}) */
  jobQueue: z.string().min(1).default('{{flow}}-job-queue'),
  /** Mustache template for the job definition ({{flow}}, {{step}}) */
  jobDefinition: z.string().min(1).default('{{flow}}-{{step}}'),
  timeoutSeconds: z.number().int().positive().default(3600),
  vcpu: z.number().int().positive().default(2),
  memoryMb: z.number().int().positive().default(4096),
  image: z.string().default(''),
  env: StringMapSchema.default({}),
});

export const LocalConfigSchema = z.object({
  /** Upper bound on in-flight elements in a fan-out wave */
  maxWorkers: z.number().int().positive().optional(),
  /** Base directory for the intermediate store; a temp dir when absent */
  storeDir: z.string().min(1).optional(),
});

export const StepConfigSchema = z.object({
  buildDir: z.string().min(1).default('stepline-build'),
  aws: AwsConfigSchema.default({}),
  lambda: LambdaConfigSchema.default({}),
  batch: BatchConfigSchema.default({}),
  /** Retry policy for steps that declare none */
  retry: RetryPolicySchema.default({}),
  local: LocalConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type StepConfigInput = z.input<typeof StepConfigSchema>;

export type StepConfig = z.output<typeof StepConfigSchema>;
