import { toPascalCase } from '../utils.js';

export function stateName(stepName: string): string {
  return toPascalCase(stepName);
}

export function mapStateName(sourceStep: string): string {
  return `${toPascalCase(sourceStep)}Map`;
}
