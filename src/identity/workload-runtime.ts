import { mkdir } from "node:fs/promises";
import path from "node:path";
import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { hostPathFor } from "./path-safety.js";
import type { WorkloadConfig } from "./types.js";

export const WORKLOAD_CONTAINER_NAME = "workload";

export interface WorkloadMount {
  /** Absolute host directory */
  source: string;
  /** Validated container directory */
  destination: string;
}

export interface WorkloadPlan {
  image: string;
  mounts: WorkloadMount[];
  containerPort: number;
  /** Host port; null until the workload is exposed */
  publishedPort: number | null;
}

export interface WorkloadPlanOptions {
  hostRoot: string;
  publishedPort: number;
}

/** Desired container state for a stored workload. */
export function planWorkload(workload: WorkloadConfig, exposed: boolean, options: WorkloadPlanOptions): WorkloadPlan {
  return {
    image: workload.image,
    mounts: workload.persistDirs.map((destination) => ({
      source: path.resolve(hostPathFor(destination, options.hostRoot)),
      destination,
    })),
    containerPort: workload.port,
    publishedPort: exposed ? options.publishedPort : null,
  };
}

/**
 * Receives committed workload state. Called after the transition is durable;
 * a failure here never undoes the transition.
 */
export interface WorkloadRuntime {
  apply(workload: WorkloadConfig, exposed: boolean): Promise<void>;
}

/** Records and logs the desired state without touching a container engine. */
export class RecordingWorkloadRuntime implements WorkloadRuntime {
  private current: WorkloadPlan | null = null;

  constructor(private readonly options: WorkloadPlanOptions) {}

  get desired(): WorkloadPlan | null {
    return this.current;
  }

  apply(workload: WorkloadConfig, exposed: boolean): Promise<void> {
    this.current = planWorkload(workload, exposed, this.options);
    logger.info("Workload desired state recorded", {
      image: workload.image,
      mounts: this.current.mounts.length,
      publishedPort: this.current.publishedPort,
    });
    return Promise.resolve();
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "statusCode" in err && err.statusCode === 404;
}

/**
 * Runs the workload as a single container on a Docker-compatible engine.
 * Every apply replaces the container: persist dirs are bind-mounted from the
 * host root, and the port is published only once the workload is exposed.
 */
export class DockerWorkloadRuntime implements WorkloadRuntime {
  constructor(
    private readonly docker: Docker,
    private readonly options: WorkloadPlanOptions,
  ) {}

  async apply(workload: WorkloadConfig, exposed: boolean): Promise<void> {
    const plan = planWorkload(workload, exposed, this.options);

    await this.pullImage(plan.image);
    await this.removeExisting();
    for (const mount of plan.mounts) {
      await mkdir(mount.source, { recursive: true });
    }

    const portKey = `${plan.containerPort}/tcp`;
    const published = plan.publishedPort;
    const container = await this.docker.createContainer({
      Image: plan.image,
      name: WORKLOAD_CONTAINER_NAME,
      ExposedPorts: published === null ? undefined : { [portKey]: {} },
      HostConfig: {
        Binds: plan.mounts.map((m) => `${m.source}:${m.destination}`),
        PortBindings: published === null ? undefined : { [portKey]: [{ HostPort: String(published) }] },
        RestartPolicy: { Name: "unless-stopped" },
        SecurityOpt: ["no-new-privileges"],
      },
    });
    await container.start();

    logger.info(`Started workload container ${container.id}`, { image: plan.image, publishedPort: published });
  }

  private async pullImage(image: string): Promise<void> {
    const stream = await this.docker.pull(image, {});
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async removeExisting(): Promise<void> {
    try {
      await this.docker.getContainer(WORKLOAD_CONTAINER_NAME).remove({ force: true });
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
  }
}
