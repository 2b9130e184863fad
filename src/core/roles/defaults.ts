import { CapabilitySet } from '../capability/set.js';
import { Capabilities } from '../capability/types.js';
import { RoleRegistry } from './registry.js';

const { READ_FILE, WRITE_FILE, SEARCH, EXECUTE_SHELL, CREATE_PLAN } = Capabilities;

/** Where the planner may write: markdown and anything named like a plan. */
export const PLAN_ARTIFACT_PATTERNS = ['**/*.md', '**/*plan*', '**/*plan*/**'];

/** Environment files no built-in role may read. */
export const SECRET_FILE_PATTERNS = ['.env', '.env.*', '*.env', '*.env.*'];
export const SECRET_FILE_ALLOW = ['.env.example', '*.env.example'];

export const DEFAULT_ROOT_ROLE = 'coder';

const readFiles = { kind: READ_FILE, deny: SECRET_FILE_PATTERNS, allow: SECRET_FILE_ALLOW };

export interface BuiltinRole {
  id: string;
  description: string;
  capabilities: CapabilitySet;
  maxSteps: number;
}

export const BUILTIN_ROLES: readonly BuiltinRole[] = [
  {
    id: 'coder',
    description: 'Full-access coding role for development work',
    capabilities: CapabilitySet.of([readFiles, WRITE_FILE, SEARCH, EXECUTE_SHELL, CREATE_PLAN]),
    maxSteps: 100
  },
  {
    id: 'researcher',
    description: 'Read-only role for exploring codebases',
    capabilities: CapabilitySet.of([readFiles, SEARCH]),
    maxSteps: 30
  },
  {
    id: 'planner',
    description: 'Writes implementation plans, nothing else',
    capabilities: CapabilitySet.of([readFiles, SEARCH, { kind: WRITE_FILE, paths: PLAN_ARTIFACT_PATTERNS }]),
    maxSteps: 20
  },
  {
    id: 'reviewer',
    description: 'Reviews code for bugs and improvements without changing it',
    capabilities: CapabilitySet.of([readFiles, SEARCH]),
    maxSteps: 20
  }
];

/**
 * Registers the four built-in roles and seals the registry. `personas` supplies the prompt
 * text per role; roles without one get an empty persona.
 */
export function createDefaultRegistry(personas: Record<string, string> = {}): RoleRegistry {
  const registry = new RoleRegistry();
  for (const r of BUILTIN_ROLES) {
    registry.register(r.id, r.capabilities, personas[r.id] ?? '', {
      description: r.description,
      maxSteps: r.maxSteps
    });
  }
  return registry.seal();
}
