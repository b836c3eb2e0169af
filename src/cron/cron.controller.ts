import { BadRequestException, Controller, HttpCode, HttpStatus, Post, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiQuery, ApiTags } from '@nestjs/swagger';
import { RolesGuard } from '../auth/roles.guard';
import { Roles } from '../auth/roles.decorator';
import { User } from '../auth/user.decorator';
import type { AuthUser } from '../auth/user.decorator';
import { PlayerImportService } from '../import/player-import.service';
import { resolveImportTarget } from '../import/import.config';
import { errorMessage } from '../import/import.errors';

@ApiTags('Admin')
@ApiBearerAuth('bearer')
@Controller('admin/import')
export class CronController {
  constructor(private readonly importer: PlayerImportService) {}

  // Run manual (sin lock: los runs concurrentes no se coordinan, gana el último commit)
  @UseGuards(RolesGuard)
  @Roles('admin')
  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ApiQuery({ name: 'league', required: false, example: 'epl' })
  @ApiQuery({ name: 'season', required: false, example: '2025' })
  async run(
    @Query('league') league?: string,
    @Query('season') season?: string,
    @User() user?: AuthUser,
  ) {
    const target = this.target(league, season);
    const result = await this.importer.runImport(target.league, target.season);
    return { ok: true, requestedBy: user?.name ?? null, result };
  }

  private target(league?: string, season?: string) {
    try {
      return resolveImportTarget(process.env, league, season);
    } catch (e) {
      throw new BadRequestException(errorMessage(e));
    }
  }
}
