/**
 * OKX public market data: REST candle source and WebSocket candle stream
 */

export { OKX_BARS, candleChannel, timeframeFromChannel } from './bars';
export { OkxRestClient, type OkxRestClientOptions } from './rest/client';
export {
  OkxStreamingClient,
  toStreamCandle,
  type OkxStreamEvents,
  type OkxStreamingOptions,
  type StreamCandle,
  type StreamSocket,
} from './websocket/client';
