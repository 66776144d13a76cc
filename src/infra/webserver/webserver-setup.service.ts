import { INestApplication, Injectable, Logger } from '@nestjs/common';
import { WebserverConfig } from '@infra/webserver/webserver.config';
import { getAppName } from '@common/env';

@Injectable()
export class WebserverSetupService {
  private readonly logger = new Logger('Webserver');

  constructor(private readonly config: WebserverConfig) {}

  public async setup(app: INestApplication): Promise<void> {
    await app.listen(this.config.port);

    this.logger.log(`Serving ${getAppName()} on ${this.config.publicUrl}`);
  }
}
