import { PubSub, type Topic } from '@google-cloud/pubsub';
import type { JobPayload } from '../../../src/types/domain';

export interface Publisher {
  /** publish して ack（message id）が返るまで待つ */
  publish(topicName: string, payload: JobPayload): Promise<string>;
}

export class PubSubPublisher implements Publisher {
  private readonly client: PubSub;
  private readonly topics = new Map<string, Topic>();

  constructor(projectId: string, client?: PubSub) {
    this.client = client ?? new PubSub({ projectId });
  }

  async publish(topicName: string, payload: JobPayload): Promise<string> {
    let topic = this.topics.get(topicName);
    if (!topic) {
      topic = this.client.topic(topicName);
      this.topics.set(topicName, topic);
    }
    return topic.publishMessage({ json: payload });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
