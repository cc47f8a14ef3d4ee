/**
 * Templates seeded into a fresh store
 */

import { createEntry } from '@quicklaunch/core';
import type { Entry, EntryInput } from '@quicklaunch/core';

export const DEFAULT_TEMPLATES: readonly EntryInput[] = [
  {
    alias: 'git-setup',
    command: 'git clone {repo} && cd {project} && npm install',
    description: 'Clone repo and setup Node.js project',
  },
  {
    alias: 'backup',
    command: 'tar -czf backup-$(date +%Y%m%d).tar.gz {directory}',
    description: 'Create timestamped backup of directory',
  },
  {
    alias: 'deploy',
    command: 'git pull && {build_command} && {deploy_command}',
    description: 'Pull, build and deploy sequence',
  },
  {
    alias: 'docker-build',
    command: 'docker build -t {image_name} . && docker run -p {port}:{port} {image_name}',
    description: 'Build and run Docker container',
  },
];

export function defaultEntries(now: Date = new Date()): Entry[] {
  return DEFAULT_TEMPLATES.map((input) => createEntry('template', input, now));
}
