/**
 * Supplies the active classification thresholds for a deployment.
 *
 * Implementations might read a CMS options table, a JSON file or environment
 * variables; the service only needs validated overrides back.
 */

import type { Result } from 'neverthrow';

import type { ClassificationConfigOverrides } from '../config/classification-config.js';

export interface IClassificationConfigProvider {
  /**
   * @param deployment - Deployment or site key; implementations decide the default
   */
  getActiveConfig(deployment?: string): Promise<Result<ClassificationConfigOverrides, Error>>;
}
