import { AppError } from '@common/errors/app-error';

export class ProxyNotFoundAppError extends AppError {
  public readonly code = 'ERR_PROXY_NOT_FOUND';

  constructor(public readonly proxyId: number) {
    super(`Proxy ${proxyId} does not exist`);
  }

  public payload(): object {
    return { proxyId: this.proxyId };
  }
}
