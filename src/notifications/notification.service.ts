import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { NotFoundError } from '../common/exceptions/domain.exceptions';
import { Actor } from '../common/types/actor';
import { Notification, NotificationMetadata, NotificationPriority } from './entities/notification.entity';
import { NotificationEvent, Recipient, describeNotification } from './notification-events';

const PRIORITIES: Record<'low' | 'medium' | 'high', NotificationPriority> = {
  low: NotificationPriority.LOW,
  medium: NotificationPriority.MEDIUM,
  high: NotificationPriority.HIGH,
};

function metadataOf(event: NotificationEvent): NotificationMetadata {
  const metadata: NotificationMetadata = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === 'recipients' || key === 'type') continue;
    if (value instanceof Date) {
      metadata[key] = value.toISOString();
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
      metadata[key] = value;
    }
  }
  return metadata;
}

function recipientKey(recipient: Recipient): string {
  return recipient.kind === 'user' ? `user:${recipient.userId}` : `role:${recipient.role}`;
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectRepository(Notification)
    private notificationRepository: Repository<Notification>,
  ) {}

  /**
   * Fire-and-forget delivery used by the workflow services once their
   * transaction has committed.
   */
  dispatch(event: NotificationEvent): void {
    void this.deliver(event).catch((error: unknown) => {
      const stack = error instanceof Error ? error.stack : String(error);
      this.logger.error(`Failed to deliver ${event.type} notification`, stack);
    });
  }

  async deliver(event: NotificationEvent): Promise<Notification[]> {
    const unique = new Map<string, Recipient>();
    event.recipients.forEach((r) => unique.set(recipientKey(r), r));
    if (unique.size === 0) {
      this.logger.warn(`${event.type} notification has no recipients`);
      return [];
    }

    const content = describeNotification(event);
    const metadata = metadataOf(event);
    const rows = [...unique.values()].map((recipient) =>
      this.notificationRepository.create({
        title: content.title,
        message: content.message,
        type: event.type,
        priority: PRIORITIES[content.priority],
        recipientUserId: recipient.kind === 'user' ? recipient.userId : null,
        recipientRole: recipient.kind === 'role' ? recipient.role : null,
        projectId: event.projectId,
        read: false,
        readAt: null,
        metadata,
      }),
    );
    const saved = await this.notificationRepository.save(rows);
    this.logger.debug(`Delivered ${event.type} to ${saved.length} recipient(s)`);
    return saved;
  }

  async findForActor(actor: Actor, unreadOnly = false): Promise<Notification[]> {
    const [direct, byRole] = await Promise.all([
      this.notificationRepository.find({ where: { recipientUserId: actor.id } }),
      this.notificationRepository.find({ where: { recipientRole: actor.role } }),
    ]);
    return [...direct, ...byRole]
      .filter((n) => !unreadOnly || !n.read)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getUnreadCount(actor: Actor): Promise<number> {
    return (await this.findForActor(actor, true)).length;
  }

  async markAsRead(id: string, actor: Actor, now: Date = new Date()): Promise<Notification> {
    const notification = await this.notificationRepository.findOne({ where: { id } });
    const visible =
      notification !== null &&
      (notification.recipientUserId === actor.id || notification.recipientRole === actor.role);
    if (!notification || !visible) {
      throw new NotFoundError('Notification', id);
    }
    if (notification.read) return notification;

    notification.read = true;
    notification.readAt = now;
    return this.notificationRepository.save(notification);
  }
}
