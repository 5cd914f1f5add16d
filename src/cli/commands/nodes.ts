import { Command } from 'commander';
import { NodeRecord, RoutePlan } from '../../models';
import { CommonOptions, toFilter, withFleet } from '../context';

function describeRoute(plan: RoutePlan): string {
  switch (plan.mode) {
    case 'direct':
      return `direct ${plan.endpoint.host}:${plan.endpoint.port}`;
    case 'relayed':
      return `relayed via ${plan.endpoint}`;
    case 'unreachable':
      return `unreachable (${plan.reason})`;
  }
}

export function formatNodeTable(nodes: NodeRecord[], plans: RoutePlan[]): string {
  const routes = new Map(plans.map((plan) => [plan.nodeId, describeRoute(plan)]));
  const header = ['NAME', 'STATE', 'PUBLIC', 'PRIVATE', 'ROUTE'];
  const rows = nodes.map((node) => [
    node.name,
    node.state,
    node.addresses.publicAddress ?? '-',
    node.addresses.privateAddress ?? '-',
    routes.get(node.name) ?? '-',
  ]);
  const widths = header.map((title, column) => Math.max(title.length, ...rows.map((row) => row[column].length)));
  return [header, ...rows]
    .map((cells) =>
      cells
        .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
        .join('  ')
        .trimEnd()
    )
    .join('\n');
}

export function nodesCommand(program: Command): void {
  program
    .command('nodes')
    .description('List fleet nodes and how each one would be reached')
    .option('-p, --pattern <glob>', 'Only nodes whose name matches the glob')
    .option('--json', 'Print JSON instead of a table')
    .action(async (options: CommonOptions) => {
      await withFleet(options, async (fleet) => {
        const nodes = await fleet.listNodes(toFilter(options));
        const plans = await fleet.resolver.resolveAll(nodes);

        if (options.json) {
          console.log(JSON.stringify({ nodes, routes: plans }, null, 2));
          return;
        }
        if (nodes.length === 0) {
          console.log('No nodes found');
          return;
        }
        console.log(formatNodeTable(nodes, plans));
      });
    });
}
