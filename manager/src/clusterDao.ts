/**
 * Cluster DAO — Ray clusters as seen through kubectl and the Ray Helm chart.
 *
 * A DAO is bound to one namespace. The factory exists so the HTTP layer can
 * build one per request when a caller targets another namespace.
 */

import { CommandError, NotFoundError } from '@raygate/shared';
import type { ClusterDetails, ClusterSummary, CreateClusterRequest } from '@raygate/shared';
import { runCommand, type CommandRunner } from './commandRunner.js';

export interface ClusterDao {
  readonly namespace: string;
  getAll(): Promise<ClusterSummary[]>;
  get(name: string): Promise<ClusterDetails>;
  create(request: CreateClusterRequest): Promise<ClusterSummary>;
  delete(name: string): Promise<void>;
}

export interface ClusterDaoFactory {
  createInstance(namespace: string): ClusterDao;
}

export interface KubectlDaoOptions {
  /** Directory holding the Ray Helm chart; every command runs here */
  chartDir: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class KubectlClusterDao implements ClusterDao {
  private readonly run: (command: string[]) => Promise<string>;

  constructor(
    public readonly namespace: string,
    options: KubectlDaoOptions,
  ) {
    const runner = options.runner ?? runCommand;
    this.run = (command) => runner(command, { cwd: options.chartDir, timeoutMs: options.timeoutMs });
  }

  async getAll(): Promise<ClusterSummary[]> {
    console.log(`[manager] Get all clusters in ${this.namespace}`);
    const output = await this.run([
      'kubectl',
      '-n',
      this.namespace,
      'get',
      'rayclusters',
      '--no-headers',
      '-o',
      'custom-columns=NAME:metadata.name',
    ]);

    return output
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((name) => ({ name }));
  }

  async get(name: string): Promise<ClusterDetails> {
    console.log(`[manager] Get details for cluster ${name}`);
    const host = `${name}-ray-head`;
    const command = [
      'kubectl',
      '-n',
      this.namespace,
      'get',
      'service',
      host,
      '-o',
      'custom-columns=IP:.spec.clusterIP,PORT:.spec.ports[0].targetPort',
      '--no-headers',
    ];

    const output = await this.guardNotFound(name, () => this.run(command));
    const [ip, port] = output.trim().split(/\s+/);
    if (!ip || !port) {
      throw new CommandError(command, 0, `Unexpected service output for ${host}: ${output.trim()}`);
    }

    return { name, host, ip, port };
  }

  async create(request: CreateClusterRequest): Promise<ClusterSummary> {
    console.log(`[manager] Create cluster ${request.name}`);
    await this.run([
      'helm',
      '-n',
      this.namespace,
      'install',
      request.name,
      '--set',
      'clusterOnly=true',
      '.',
      '--create-namespace',
    ]);
    return { name: request.name };
  }

  async delete(name: string): Promise<void> {
    console.log(`[manager] Delete cluster ${name}`);
    await this.guardNotFound(name, () =>
      this.run(['kubectl', '-n', this.namespace, 'delete', 'rayclusters', name]),
    );
  }

  /** kubectl reports missing resources only through stderr ("... NotFound ..."). */
  private async guardNotFound<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof CommandError && err.stderr.includes('NotFound')) {
        throw NotFoundError.cluster(name, err.message);
      }
      throw err;
    }
  }
}

export class KubectlClusterDaoFactory implements ClusterDaoFactory {
  constructor(private readonly options: KubectlDaoOptions) {}

  createInstance(namespace: string): ClusterDao {
    return new KubectlClusterDao(namespace, this.options);
  }
}
