import { Logger } from 'winston';

export abstract class BasePlatform {
  protected readonly logger: Logger;

  readonly name: string;

  constructor(name: string, logger: Logger) {
    this.name = name;
    this.logger = logger;
  }

  protected async timed<T>(what: string, action: () => Promise<T>): Promise<T> {
    const start = new Date().getTime();
    try {
      return await action();
    } finally {
      this.logger.debug('%s %s time %d', this.name, what, new Date().getTime() - start);
    }
  }
}
