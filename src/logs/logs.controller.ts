import {
  Controller,
  Get,
  Param,
  Query,
  UseGuards,
  Req,
  UnauthorizedException,
} from '@nestjs/common';
import { LogsService } from './logs.service';
import { LogQueryDto } from './dto/log-query.dto';
import { AuthGuard, type RequestWithUser } from '../auth/auth.guard';
import { PermissionsGuard } from '../auth/permissions.guard';
import { RequirePermissions } from '../auth/permissions.decorator';
import { Permission } from '../auth/permissions.enum';

@Controller('api/v1/:sessionId/logs')
@UseGuards(AuthGuard, PermissionsGuard)
export class LogsController {
  constructor(private readonly logsService: LogsService) {}

  @Get()
  @RequirePermissions(Permission.LOGS_VIEW)
  async list(
    @Param('sessionId') sessionId: string,
    @Query() query: LogQueryDto,
    @Req() req: RequestWithUser,
  ) {
    const { sessionId: userSession } = req.user;
    if (userSession !== sessionId) {
      throw new UnauthorizedException({ key: 'auth.no_permission' });
    }

    return this.logsService.findAll(sessionId, query);
  }
}
