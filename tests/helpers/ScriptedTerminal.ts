import { ExpectChannel } from '../../src/session/ExpectChannel';
import { ExpectResult, Pattern, SessionTerminal } from '../../src/session/types';

/**
 * In-process SessionTerminal that answers each line sent with the next
 * scripted reply.
 */
export class ScriptedTerminal implements SessionTerminal {
  readonly sent: string[] = [];
  startError: Error | null = null;
  alive = false;
  starts = 0;
  private channel: ExpectChannel;
  private replies: string[] = [];

  readonly terminate = jest.fn(async (): Promise<void> => {
    this.alive = false;
    this.channel.end();
  });

  constructor(private readonly greeting: string, replies: string[] = []) {
    this.replies = [...replies];
    this.channel = this.newChannel();
  }

  /**
   * Replace the replies used for the next lines sent
   */
  script(replies: string[]): void {
    this.replies = [...replies];
  }

  start(): void {
    if (this.startError) {
      throw this.startError;
    }
    this.starts++;
    this.alive = true;
    this.channel = this.newChannel();
    this.channel.feed(this.greeting);
  }

  isAlive(): boolean {
    return this.alive;
  }

  sendLine(line: string): void {
    if (!this.alive) {
      throw new Error('not running');
    }
    this.channel.sendLine(line);
  }

  expect(patterns: Pattern[], timeout: number): Promise<ExpectResult> {
    return this.channel.expect(patterns, timeout);
  }

  private newChannel(): ExpectChannel {
    return new ExpectChannel({
      write: (data) => {
        this.sent.push(data.replace(/\n$/, ''));
        const reply = this.replies.shift();
        if (reply !== undefined) {
          this.channel.feed(reply);
        }
      }
    });
  }
}

export const SITE = 'vpn.example.test';

/**
 * Replies of a client that connects and disconnects cleanly, in send order:
 * tool command, disconnect, connect, username, password, y
 */
export const CONNECT_REPLIES = [
  'Cisco AnyConnect Secure Mobility Client\nVPN> ',
  '  >> state: Disconnected\nVPN> ',
  `  >> contacting host (${SITE}) for login information...\nUsername: `,
  'Password: ',
  'Authorized use only.\n\naccept? [y/n]: ',
  `  >> state: Connected\n  >> notice: Connected to ${SITE}.\nVPN> `
];

/**
 * Replies to disconnect and exit
 */
export const DISCONNECT_REPLIES = [
  '  >> state: Disconnected\nVPN> ',
  '$ '
];
