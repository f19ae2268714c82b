import type { ComponentDefinition, ComponentName } from './types.js';

export const COMPONENTS: Readonly<Record<ComponentName, ComponentDefinition>> = {
  skills: {
    name: 'skills',
    label: 'Skills',
    description: 'Custom commands (review, test, explain, etc.)',
    kind: 'directory-items',
    directory: 'skills',
    pattern: '*',
  },
  agents: {
    name: 'agents',
    label: 'Agents',
    description: 'Specialized subagents (researcher, reviewer)',
    kind: 'file-items',
    directory: 'agents',
    pattern: '*.md',
  },
  hooks: {
    name: 'hooks',
    label: 'Hooks',
    description: 'Security and auto-formatting hooks',
    kind: 'file-items',
    directory: 'hooks',
    pattern: '*.sh',
    executable: true,
  },
  rules: {
    name: 'rules',
    label: 'Rules',
    description: 'Reference documentation',
    kind: 'file-items',
    directory: 'rules',
    pattern: '*.md',
  },
  precommit: {
    name: 'precommit',
    label: 'Pre-commit',
    description: 'Review changes before every commit',
    kind: 'composite',
  },
  security: {
    name: 'security',
    label: 'Security',
    description: 'Security configuration (permissions + hooks)',
    kind: 'composite',
  },
  stack: {
    name: 'stack',
    label: 'Stack preset',
    description: 'Language-specific configuration',
    kind: 'composite',
  },
};

/** Components run, in order, by `all`. */
export const ALL_SEQUENCE: readonly ComponentName[] = ['skills', 'agents', 'hooks', 'rules', 'security'];
