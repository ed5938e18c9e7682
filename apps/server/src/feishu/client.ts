import * as lark from '@larksuiteoapi/node-sdk';
import { log } from '../utils/log.js';

const appId = process.env.FEISHU_APP_ID;
const appSecret = process.env.FEISHU_APP_SECRET;

if (!appId || !appSecret) {
  log('warn', 'feishu_credentials_missing', {});
}

/** 回复消息用的 API client（tenant token 由 SDK 缓存） */
export const feishuClient = new lark.Client({
  appId: appId || '',
  appSecret: appSecret || '',
  domain: process.env.FEISHU_DOMAIN === 'lark' ? lark.Domain.Lark : lark.Domain.Feishu,
  disableTokenCache: false,
});
