/**
 * hpikit roles: List the dependency roles and how they feed each other
 */

import { Command } from 'commander';
import { createStandardRoleGraph } from '@hpikit/engine';
import { t, visibilityColor } from '../theme.js';

export const rolesCommand = (): Command =>
  new Command('roles')
    .description('List dependency roles in resolution order')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const graph = createStandardRoleGraph();
      const roles = graph.topologicalOrder().map((id) => graph.get(id));

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(roles.map((r) => ({
          id: r.id,
          visibility: r.visibility,
          description: r.description,
          extends_into: r.extendsInto,
          exclusions: r.exclusions.map((e) => `${e.group}:${e.module}`),
        })), null, 2));
        return;
      }

      for (const role of roles) {
        // eslint-disable-next-line no-console
        console.log(`${visibilityColor(role.visibility)(role.id)}  ${t.muted(role.visibility)}`);
        if (role.description !== '') {
          // eslint-disable-next-line no-console
          console.log(`  ${role.description}`);
        }
        if (role.extendsInto.length > 0) {
          // eslint-disable-next-line no-console
          console.log(`  ${t.muted('→')} ${role.extendsInto.join(', ')}`);
        }
      }
    });
