/**
 * Answers issued by the QA service during this process's lifetime.
 *
 * Feedback is only accepted for ids registered here. Posted Slack messages
 * are also mapped back to their answer id so reactions can find them.
 * Nothing here survives a restart.
 */

const MAX_TRACKED_MESSAGES = 5000;

export class AnswerRegistry {
  private issued = new Set<string>();
  private byMessage = new Map<string, string>();

  register(answerId: string): void {
    this.issued.add(answerId);
  }

  has(answerId: string): boolean {
    return this.issued.has(answerId);
  }

  /**
   * Remember which Slack message carries an answer
   */
  linkMessage(channel: string, messageTs: string, answerId: string): void {
    this.register(answerId);
    this.byMessage.set(`${channel}:${messageTs}`, answerId);

    // Oldest links go first; Map keeps insertion order
    if (this.byMessage.size > MAX_TRACKED_MESSAGES) {
      const oldest = this.byMessage.keys().next();
      if (!oldest.done) this.byMessage.delete(oldest.value);
    }
  }

  answerForMessage(channel: string, messageTs: string): string | undefined {
    return this.byMessage.get(`${channel}:${messageTs}`);
  }
}
