import { existsSync } from 'node:fs';
import type { Resources, WindowConfig } from '../core/types.js';
import {
  localArtifactLoader,
  staticTypeResolver,
  type ArtifactHandle,
  type ArtifactLoader,
  type FunctionTypeResolver,
} from './artifact.js';
import { isValidTopicName } from './topic-name.js';
import { validateResourceLimits } from './resources.js';
import { validateSchemaType, validateSerdeClass } from './schema.js';
import { validateWindowConfig } from './window-config.js';

export type TypeCompatibilityCheck = (
  name: string,
  typeClassName: string,
  artifact: ArtifactHandle,
  isInput: boolean,
) => void;

/**
 * Everything validation consults outside its own rules. Swap any of these
 * to validate against another topic grammar, a remote artifact store, or a
 * fake in tests.
 */
export interface ValidationCollaborators {
  readonly isValidTopicName: (topic: string) => boolean;
  readonly fileExists: (path: string) => boolean;
  readonly validateWindowConfig: (window: WindowConfig) => void;
  readonly validateResourceLimits: (resources: Resources) => void;
  readonly validateSerdeClass: TypeCompatibilityCheck;
  readonly validateSchemaType: TypeCompatibilityCheck;
  readonly artifactLoader: ArtifactLoader;
  readonly typeResolver: FunctionTypeResolver;
}

export const DEFAULT_COLLABORATORS: ValidationCollaborators = {
  isValidTopicName,
  fileExists: existsSync,
  validateWindowConfig,
  validateResourceLimits,
  validateSerdeClass,
  validateSchemaType,
  artifactLoader: localArtifactLoader,
  typeResolver: staticTypeResolver({}),
};

export function resolveCollaborators(
  overrides?: Partial<ValidationCollaborators>,
): ValidationCollaborators {
  return overrides ? { ...DEFAULT_COLLABORATORS, ...overrides } : DEFAULT_COLLABORATORS;
}
