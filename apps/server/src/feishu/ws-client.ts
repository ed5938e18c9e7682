/**
 * WebSocket long connection client for Feishu events.
 *
 * Alternative to the HTTP webhook: the client dials out to Feishu, so no public
 * URL or certificate is needed. Events go through the same handlers as webhooks.
 */

import * as lark from '@larksuiteoapi/node-sdk';
import { handleCardAction, handleMessage } from './event-handlers.js';
import { isFeishuCardActionEvent, isFeishuMessageEvent } from '../types/feishu-event.js';
import { log } from '../utils/log.js';

let wsClient: lark.WSClient | null = null;

export async function startWSClient(): Promise<void> {
  const appId = process.env.FEISHU_APP_ID;
  const appSecret = process.env.FEISHU_APP_SECRET;

  if (!appId || !appSecret) {
    log('error', 'ws_client_missing_credentials', {});
    throw new Error('FEISHU_APP_ID and FEISHU_APP_SECRET are required for WebSocket mode');
  }

  log('info', 'ws_client_starting', { appId: appId.substring(0, 8) + '...' });

  wsClient = new lark.WSClient({
    appId,
    appSecret,
    loggerLevel: lark.LoggerLevel.info,
  });

  const eventDispatcher = new lark.EventDispatcher({
    verificationToken: process.env.FEISHU_VERIFICATION_TOKEN || '',
    encryptKey: process.env.FEISHU_ENCRYPT_KEY,
  }).register({
    'im.message.receive_v1': async (data: unknown) => {
      if (!isFeishuMessageEvent(data)) {
        log('warn', 'ws_message_event_invalid', {});
        return;
      }
      // 长连接要求尽快返回，转发结果异步回复
      handleMessage(data).catch(error => {
        log('error', 'ws_message_handle_failed', { error: String(error) });
      });
    },
    'card.action.trigger': async (data: unknown) => {
      if (!isFeishuCardActionEvent(data)) {
        log('warn', 'ws_card_action_invalid', {});
        return null;
      }
      log('info', 'ws_card_action_received', { openMessageId: data.context?.open_message_id });
      return handleCardAction(data);
    },
  });

  await wsClient.start({
    eventDispatcher,
  });

  log('info', 'ws_client_started', {});
}

/**
 * Stop the WebSocket client gracefully. Called during server shutdown.
 */
export async function stopWSClient(): Promise<void> {
  if (!wsClient) {
    return;
  }

  log('info', 'ws_client_stopping', {});

  try {
    wsClient.close({ force: false });
  } catch (error) {
    log('warn', 'ws_client_stop_error', { error: String(error) });
  }

  wsClient = null;
  log('info', 'ws_client_stopped', {});
}

