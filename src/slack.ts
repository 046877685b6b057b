import { WebClient } from '@slack/web-api';
import { errorMessage } from './errors';
import { isRecord } from './fields';
import { logDebug, logWarning } from './logger';

export type SlackTarget = { token: string; channel: string };

export type SlackPost = (channel: string, text: string) => Promise<unknown>;

export type SlackOptions = {
  /** builds the poster for a token; tests hand in a fake */
  connect?: (token: string) => SlackPost;
};

function webClientPost(token: string): SlackPost {
  const client = new WebClient(token);
  return (channel, text) => client.chat.postMessage({ channel, text });
}

function slackErrorCode(err: unknown): string {
  if (isRecord(err) && isRecord(err.data) && typeof err.data.error === 'string') return err.data.error;
  return errorMessage(err);
}

// best effort: no target means no post, failures are logged
export async function postSlack(text: string, target: SlackTarget | undefined, options: SlackOptions = {}): Promise<boolean> {
  if (!target) {
    logDebug('slack not configured, summary not posted');
    return false;
  }
  const post = (options.connect ?? webClientPost)(target.token);
  try {
    await post(target.channel, text);
    return true;
  } catch (err) {
    logWarning('Slack error', { channel: target.channel, error: slackErrorCode(err) });
    return false;
  }
}
