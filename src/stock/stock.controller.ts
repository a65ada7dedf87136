import {
  Controller,
  Post,
  Get,
  Put,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
  Req,
} from '@nestjs/common';
import { AuthGuard, type RequestWithUser } from '../auth/auth.guard';
import { PermissionsGuard } from '../auth/permissions.guard';
import { RequirePermissions } from '../auth/permissions.decorator';
import { Permission } from '../auth/permissions.enum';
import type { LogActor } from '../logs/logs.types';
import { StockService } from './stock.service';
import { AddLotDto } from './dto/add-lot.dto';
import { ConsumeStockDto } from './dto/consume-stock.dto';
import { ProcessDayDto } from './dto/process-day.dto';
import { ReorderPointDto } from './dto/reorder-point.dto';
import {
  LotsQueryDto,
  NearExpiryQueryDto,
  OptionalTodayQueryDto,
  PromotionPriceQueryDto,
  TodayQueryDto,
  WasteQueryDto,
} from './dto/stock-query.dto';

const actorOf = ({ user }: RequestWithUser): LogActor => ({
  userId: user.userId,
  name: user.name,
  role: user.role,
});

@Controller('api/v1/stock')
@UseGuards(AuthGuard, PermissionsGuard)
export class StockController {
  constructor(private readonly stockService: StockService) {}

  @Post('lots')
  @RequirePermissions(Permission.STOCK_RECEIVE)
  addLot(@Body() addLotDto: AddLotDto, @Req() req: RequestWithUser) {
    return this.stockService.addLot(req.user.sessionId, actorOf(req), addLotDto);
  }

  @Get('lots')
  @RequirePermissions(Permission.STOCK_VIEW)
  listLots(@Query() query: LotsQueryDto, @Req() req: RequestWithUser) {
    return this.stockService.listLots(
      req.user.sessionId,
      query.today,
      query.ingredientId,
    );
  }

  @Get('lots/:lotId')
  @RequirePermissions(Permission.STOCK_VIEW)
  getLot(
    @Param('lotId') lotId: string,
    @Query() query: TodayQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getLot(req.user.sessionId, lotId, query.today);
  }

  @Post('consume')
  @RequirePermissions(Permission.STOCK_CONSUME)
  consume(@Body() consumeDto: ConsumeStockDto, @Req() req: RequestWithUser) {
    return this.stockService.consume(req.user.sessionId, actorOf(req), consumeDto);
  }

  @Get('promotions')
  @RequirePermissions(Permission.STOCK_VIEW)
  getPromotionCandidates(
    @Query() query: TodayQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getPromotionCandidates(
      req.user.sessionId,
      query.today,
    );
  }

  @Get('promotion-price')
  @RequirePermissions(Permission.STOCK_VIEW)
  getPromotionPrice(
    @Query() query: PromotionPriceQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getPromotionPrice(
      req.user.sessionId,
      query.basePrice,
      query.discountRate,
    );
  }

  @Get('near-expiry')
  @RequirePermissions(Permission.STOCK_VIEW)
  getLotsNearExpiry(
    @Query() query: NearExpiryQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getLotsNearExpiry(
      req.user.sessionId,
      query.today,
      query.days,
    );
  }

  @Post('daily-operations')
  @RequirePermissions(Permission.STOCK_PROCESS)
  processDailyOperations(
    @Body() processDayDto: ProcessDayDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.processDailyOperations(
      req.user.sessionId,
      actorOf(req),
      processDayDto.today,
    );
  }

  @Get('waste')
  @RequirePermissions(Permission.REPORTS_VIEW)
  getWasteRecords(@Query() query: WasteQueryDto, @Req() req: RequestWithUser) {
    return this.stockService.getWasteRecords(req.user.sessionId, query);
  }

  @Get('waste/summary')
  @RequirePermissions(Permission.REPORTS_VIEW)
  getWasteSummary(@Req() req: RequestWithUser) {
    return this.stockService.getWasteSummary(req.user.sessionId);
  }

  @Get('available/:ingredientId')
  @RequirePermissions(Permission.STOCK_VIEW)
  getAvailableQuantity(
    @Param('ingredientId') ingredientId: string,
    @Query() query: OptionalTodayQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getAvailableQuantity(
      req.user.sessionId,
      ingredientId,
      query.today,
    );
  }

  @Get('rotation/:ingredientId')
  @RequirePermissions(Permission.REPORTS_VIEW)
  getRotationAnalysis(
    @Param('ingredientId') ingredientId: string,
    @Query() query: TodayQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getRotationAnalysis(
      req.user.sessionId,
      ingredientId,
      query.today,
    );
  }

  @Put('reorder-points')
  @RequirePermissions(Permission.STOCK_RECEIVE)
  setReorderPoint(
    @Body() reorderPointDto: ReorderPointDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.setReorderPoint(
      req.user.sessionId,
      actorOf(req),
      reorderPointDto,
    );
  }

  @Get('reorder-alerts')
  @RequirePermissions(Permission.STOCK_VIEW)
  getReorderAlerts(
    @Query() query: OptionalTodayQueryDto,
    @Req() req: RequestWithUser,
  ) {
    return this.stockService.getReorderAlerts(req.user.sessionId, query.today);
  }

  @Delete('session')
  @RequirePermissions(Permission.STOCK_PROCESS)
  closeSession(@Req() req: RequestWithUser) {
    return this.stockService.closeSession(req.user.sessionId, actorOf(req));
  }
}
