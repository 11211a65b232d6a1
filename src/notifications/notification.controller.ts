import { Controller, Get, Param, ParseUUIDPipe, Patch, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { Actor } from '../common/types/actor';
import { NotificationService } from './notification.service';

@ApiTags('Notifications')
@ApiBearerAuth()
@Controller('notifications')
@UseGuards(JwtAuthGuard)
export class NotificationController {
  constructor(private readonly notificationService: NotificationService) {}

  @Get()
  @ApiOperation({ summary: 'Notifications addressed to the caller or their role' })
  @ApiQuery({ name: 'unread', required: false, type: Boolean })
  async findMine(@CurrentActor() actor: Actor, @Query('unread') unread?: string) {
    const notifications = await this.notificationService.findForActor(actor, unread === 'true');
    return { success: true, notifications };
  }

  @Get('unread-count')
  async unreadCount(@CurrentActor() actor: Actor) {
    return { success: true, unread: await this.notificationService.getUnreadCount(actor) };
  }

  @Patch(':id/read')
  async markAsRead(@Param('id', ParseUUIDPipe) id: string, @CurrentActor() actor: Actor) {
    const notification = await this.notificationService.markAsRead(id, actor);
    return { success: true, notification, message: 'Notification marked as read' };
  }
}
