import { errorMessage } from './errors';
import { logger } from './logger';

interface Resource {
  readonly name: string;
  readonly release: () => Promise<void>;
  released: boolean;
}

/**
 * Resources acquired by a job, released in reverse acquisition order.
 * Releasing twice is a no-op; a release that throws is logged and the rest
 * still run.
 */
export class ResourceStack {
  private readonly resources: Resource[] = [];

  push(name: string, release: () => Promise<void>): void {
    this.resources.push({ name, release, released: false });
  }

  get held(): string[] {
    return this.resources.filter((r) => !r.released).map((r) => r.name);
  }

  async releaseAll(): Promise<void> {
    for (let i = this.resources.length - 1; i >= 0; i--) {
      const resource = this.resources[i];
      if (resource.released) continue;
      resource.released = true;
      try {
        await resource.release();
        logger.debug({ resource: resource.name }, 'Resource released');
      } catch (error) {
        logger.warn({ resource: resource.name, error: errorMessage(error) }, 'Failed to release resource');
      }
    }
  }
}
