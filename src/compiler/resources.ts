/**
 * Names and ARNs of the deployed units a compiled flow refers to.
 */

import Mustache from 'mustache';
import type { StepConfig } from '../types/config.js';

export const BATCH_SUBMIT_JOB_RESOURCE = 'arn:aws:states:::batch:submitJob.sync';
export const S3_GET_OBJECT_RESOURCE = 'arn:aws:states:::s3:getObject';
export const S3_PUT_OBJECT_RESOURCE = 'arn:aws:states:::s3:putObject';

export interface ResourceView {
  flow: string;
  step?: string;
}

/**
 * Render a resource-name template. Values are inserted verbatim.
 */
export function renderName(template: string, view: ResourceView): string {
  return Mustache.render(template, view, {}, { escape: (value: string) => value });
}

export function lambdaFunctionName(config: StepConfig, flow: string, step: string): string {
  return renderName(config.lambda.functionName, { flow, step });
}

/**
 * Function ARN with the region and account left as template substitutions,
 * resolved when the surrounding stack is deployed.
 */
export function lambdaArn(config: StepConfig, flow: string, step: string): string {
  return `arn:aws:lambda:\${AWS::Region}:\${AWS::AccountId}:function:${lambdaFunctionName(config, flow, step)}`;
}

export function batchJobQueue(config: StepConfig, flow: string): string {
  return renderName(config.batch.jobQueue, { flow });
}

export function batchJobDefinition(config: StepConfig, flow: string, step: string): string {
  return renderName(config.batch.jobDefinition, { flow, step });
}

/**
 * Key prefix under which a map state writes its per-element results.
 */
export function resultPrefixExpression(config: StepConfig, flow: string): string {
  return `States.Format('${config.aws.storagePrefix}/${flow}/{}/', $.run_id)`;
}
