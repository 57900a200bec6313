/**
 * Interactive shells over WebSocket: exec into a pod container, or into a
 * node through a privileged helper pod that enters the host namespaces.
 */

import { PassThrough, Writable } from 'node:stream';
import { z } from 'zod';
import type { AppError } from '../lib/errors/base.js';
import { errorMessage } from '../lib/errors/base.js';
import { fromKubernetesError, isNotFound } from '../lib/errors/k8s-errors.js';
import { TerminalErrors } from '../lib/errors/terminal-errors.js';
import { Kinds } from '../lib/k8s/kinds.js';
import type { ClusterClient, ClusterConnector, ExecHandle, K8sObject } from '../lib/k8s/types.js';
import { MGMT_CLUSTER_NAME } from '../lib/k8s/types.js';
import { createLogger } from '../lib/logging/logger.js';
import { randomString } from '../lib/utils/random.js';
import type { Result } from '../lib/utils/result.js';
import { err, ok } from '../lib/utils/result.js';

const log = createLogger('Terminal');

export const DEFAULT_SHELL = '/bin/bash';
export const NODE_SHELL_NAMESPACE = 'default';
export const NODE_SHELL_IMAGE = 'ubuntu';
const NODE_POD_TIMEOUT_MS = 120_000;
const NODE_POD_POLL_MS = 1000;

export const terminalMessageSchema = z.object({
  operation: z.enum(['stdin', 'resize', 'ping', 'stdout']),
  data: z.string().optional(),
  rows: z.number().int().nonnegative().optional(),
  cols: z.number().int().nonnegative().optional(),
});

export type TerminalMessage = z.infer<typeof terminalMessageSchema>;

/** The half of a WebSocket the session writes to. */
export interface TerminalSocket {
  send(data: string): void;
  close(): void;
}

/** Output stream that carries the TTY size; exec picks up `resize` events from it. */
export class TerminalSizeStream extends PassThrough {
  columns = 80;
  rows = 24;

  resize(columns: number, rows: number): void {
    this.columns = columns;
    this.rows = rows;
    this.emit('resize');
  }
}

const podContainersSchema = z.object({
  spec: z.object({ containers: z.array(z.object({ name: z.string() }).passthrough()).default([]) }).passthrough(),
});

const podPhaseSchema = z.object({ status: z.object({ phase: z.string().optional() }).passthrough().default({}) });

function send(socket: TerminalSocket, message: TerminalMessage): void {
  socket.send(JSON.stringify(message));
}

function writeError(socket: TerminalSocket, message: string): void {
  send(socket, { operation: 'stdout', data: `Error: ${message}\r\n` });
  socket.close();
}

/**
 * One exec session bound to a socket. Incoming socket messages go through
 * `handle`; `close` ends the exec and runs the cleanup hook once.
 */
export class TerminalSession {
  readonly stdin = new PassThrough();
  readonly stdout = new TerminalSizeStream();
  private exec: ExecHandle | null = null;
  private closed = false;

  constructor(
    private socket: TerminalSocket,
    private cleanup: () => Promise<void> = async () => {}
  ) {
    this.stdout.on('data', (chunk: Buffer) => send(socket, { operation: 'stdout', data: chunk.toString('utf8') }));
  }

  /** Stream that forwards stderr to the socket like stdout. */
  stderr(): Writable {
    const socket = this.socket;
    return new Writable({
      write(chunk: Buffer, _encoding, callback) {
        send(socket, { operation: 'stdout', data: chunk.toString('utf8') });
        callback();
      },
    });
  }

  attach(exec: ExecHandle): void {
    this.exec = exec;
    if (this.closed) exec.close();
  }

  handle(raw: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (error) {
      log.warn('Ignoring malformed terminal message', { error });
      return;
    }
    const message = terminalMessageSchema.safeParse(decoded);
    if (!message.success) {
      log.warn('Ignoring unknown terminal message', { data: { raw } });
      return;
    }

    switch (message.data.operation) {
      case 'stdin':
        if (message.data.data) this.stdin.write(message.data.data);
        break;
      case 'resize':
        if (message.data.cols && message.data.rows) this.stdout.resize(message.data.cols, message.data.rows);
        break;
      default:
        break;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.exec?.close();
    this.stdin.end();
    this.stdout.end();
    await this.cleanup();
  }
}

export type PodTerminalParams = {
  cluster: string;
  namespace: string;
  pod: string;
  container?: string;
  shell?: string;
};

export interface NodeTerminalParams {
  cluster: string;
  node: string;
  shell?: string;
}

export interface TerminalServiceOptions {
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  podTimeoutMs?: number;
  pollIntervalMs?: number;
  podSuffix?: () => string;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function nodeShellPod(node: string, name: string): K8sObject {
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { name, namespace: NODE_SHELL_NAMESPACE },
    spec: {
      nodeName: node,
      hostPID: true,
      hostIPC: true,
      hostNetwork: true,
      restartPolicy: 'Never',
      tolerations: [{ operator: 'Exists' }],
      containers: [
        {
          name: 'shell',
          image: NODE_SHELL_IMAGE,
          command: ['sleep', '3600'],
          stdin: true,
          tty: true,
          securityContext: { privileged: true },
        },
      ],
    },
  };
}

export const nsenterCommand = (shell: string) => [
  'nsenter',
  '--target',
  '1',
  '--mount',
  '--uts',
  '--ipc',
  '--net',
  '--pid',
  '--',
  shell,
];

export class TerminalService {
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private podTimeoutMs: number;
  private pollIntervalMs: number;
  private podSuffix: () => string;

  constructor(
    private connector: ClusterConnector,
    options: TerminalServiceOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.podTimeoutMs = options.podTimeoutMs ?? NODE_POD_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? NODE_POD_POLL_MS;
    this.podSuffix = options.podSuffix ?? (() => randomString(6));
  }

  clientFor(cluster: string): ClusterClient {
    return cluster === MGMT_CLUSTER_NAME ? this.connector.management() : this.connector.member(cluster);
  }

  /** Resolve the container to exec into: the requested one, or the pod's first. */
  async resolveContainer(
    client: ClusterClient,
    namespace: string,
    pod: string,
    container?: string
  ): Promise<Result<string, AppError>> {
    let object: K8sObject;
    try {
      object = await client.get(Kinds.pod, pod, namespace);
    } catch (error) {
      if (isNotFound(error)) return err(TerminalErrors.POD_NOT_FOUND(namespace, pod));
      return err(fromKubernetesError(error));
    }
    const parsed = podContainersSchema.safeParse(object);
    const names = parsed.success ? parsed.data.spec.containers.map((entry) => entry.name) : [];
    const first = names[0];
    if (!first) return err(TerminalErrors.NO_CONTAINERS(namespace, pod));
    if (!container) return ok(first);
    return names.includes(container) ? ok(container) : err(TerminalErrors.CONTAINER_NOT_FOUND(container, namespace, pod));
  }

  /** Exec a shell in a pod. Returns null when the session could not start; the socket is then closed. */
  async openPod(socket: TerminalSocket, params: PodTerminalParams): Promise<TerminalSession | null> {
    const client = this.clientFor(params.cluster);
    const container = await this.resolveContainer(client, params.namespace, params.pod, params.container);
    if (!container.ok) {
      log.error('Pod terminal rejected', { data: params, error: container.error.message });
      writeError(socket, container.error.message);
      return null;
    }

    send(socket, {
      operation: 'stdout',
      data: `Connected to pod ${params.namespace}/${params.pod}, container: ${container.value}\r\n`,
    });
    const session = new TerminalSession(socket);
    const started = await this.start(socket, session, client, {
      namespace: params.namespace,
      pod: params.pod,
      container: container.value,
      command: [params.shell || DEFAULT_SHELL],
    });
    return started ? session : null;
  }

  /** Start a helper pod on the node and exec into the host namespaces through it. */
  async openNode(socket: TerminalSocket, params: NodeTerminalParams): Promise<TerminalSession | null> {
    const client = this.clientFor(params.cluster);
    const podName = `node-shell-${params.node}-${this.podSuffix()}`;

    try {
      await client.create(nodeShellPod(params.node, podName));
    } catch (error) {
      const message = fromKubernetesError(error).message;
      log.error('Failed to create shell pod', { data: { ...params, pod: podName }, error: message });
      writeError(socket, `Failed to create shell pod: ${message}`);
      return null;
    }
    log.info('Shell pod created', { data: { cluster: params.cluster, node: params.node, pod: podName } });

    const removePod = async () => {
      try {
        await client.delete(Kinds.pod, podName, NODE_SHELL_NAMESPACE);
        log.info('Shell pod deleted', { data: { pod: podName } });
      } catch (error) {
        log.error('Failed to delete shell pod', { data: { pod: podName }, error: fromKubernetesError(error).message });
      }
    };

    const running = await this.waitForRunning(client, podName);
    if (!running.ok) {
      writeError(socket, running.error.message);
      await removePod();
      return null;
    }

    send(socket, { operation: 'stdout', data: `Connected to node ${params.node}, via pod ${podName}\r\n` });
    const session = new TerminalSession(socket, removePod);
    const started = await this.start(socket, session, client, {
      namespace: NODE_SHELL_NAMESPACE,
      pod: podName,
      container: 'shell',
      command: nsenterCommand(params.shell || DEFAULT_SHELL),
    });
    return started ? session : null;
  }

  async waitForRunning(client: ClusterClient, pod: string): Promise<Result<void, AppError>> {
    const deadline = this.now() + this.podTimeoutMs;
    while (this.now() < deadline) {
      try {
        const object = await client.get(Kinds.pod, pod, NODE_SHELL_NAMESPACE);
        const phase = podPhaseSchema.safeParse(object);
        const current = phase.success ? phase.data.status.phase : undefined;
        if (current === 'Running') return ok(undefined);
        if (current === 'Failed' || current === 'Succeeded') {
          return err(TerminalErrors.SHELL_POD_NOT_RUNNING(pod, `pod terminated with phase ${current}`));
        }
      } catch (error) {
        if (!isNotFound(error)) {
          return err(TerminalErrors.SHELL_POD_NOT_RUNNING(pod, fromKubernetesError(error).message));
        }
      }
      await this.sleep(this.pollIntervalMs);
    }
    return err(TerminalErrors.SHELL_POD_NOT_RUNNING(pod, 'timed out waiting for pod to be running'));
  }

  private async start(
    socket: TerminalSocket,
    session: TerminalSession,
    client: ClusterClient,
    target: { namespace: string; pod: string; container: string; command: string[] }
  ): Promise<boolean> {
    try {
      const exec = await client.exec(
        { ...target, tty: true },
        {
          stdout: session.stdout,
          stderr: session.stderr(),
          stdin: session.stdin,
          onStatus: (status) => {
            if (status.status === 'Failure') {
              send(socket, { operation: 'stdout', data: `Connection closed: ${status.message ?? 'unknown'}\r\n` });
            }
            socket.close();
          },
        }
      );
      session.attach(exec);
      log.info('Terminal session started', { data: { ...target } });
      return true;
    } catch (error) {
      log.error('Failed to start exec', { data: { ...target }, error });
      writeError(socket, `Failed to create executor: ${errorMessage(error)}`);
      await session.close();
      return false;
    }
  }
}
