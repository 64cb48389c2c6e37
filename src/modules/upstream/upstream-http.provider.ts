import { FactoryProvider, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/gateway.config';
import { UPSTREAM_HTTP } from './upstream.constants';

const logger = new Logger('UpstreamHttp');

export function createUpstreamHttp(config: GatewayConfig): AxiosInstance {
  if (!config.proxyUrl) {
    return axios.create();
  }

  const { protocol, host } = new URL(config.proxyUrl);
  const agent = protocol.startsWith('socks')
    ? new SocksProxyAgent(config.proxyUrl)
    : new HttpsProxyAgent(config.proxyUrl);

  logger.log(`Routing upstream traffic through ${protocol}//${host}`);

  // axios' own proxy handling knows nothing about SOCKS; the agents do the tunnelling
  return axios.create({
    proxy: false,
    httpAgent: agent,
    httpsAgent: agent,
  });
}

export const upstreamHttpProvider: FactoryProvider<AxiosInstance> = {
  provide: UPSTREAM_HTTP,
  useFactory: createUpstreamHttp,
  inject: [GATEWAY_CONFIG],
};
