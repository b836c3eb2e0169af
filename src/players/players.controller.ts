import { Controller, Get, Header, Param, ParseIntPipe, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/public.decorator';
import {
  ListPlayersQueryDto,
  PaginatedPlayersQueryDto,
  SearchPlayersQueryDto,
} from '../dto/player.dto';
import { PlayersService } from './players.service';
import { renderPlayersTable } from './players.html';

@ApiTags('Players')
@Public()
@Controller('players')
export class PlayersController {
  constructor(private readonly svc: PlayersService) {}

  @Get()
  list(@Query() q: ListPlayersQueryDto) {
    return this.svc.list(q);
  }

  // Rutas estáticas antes de ':id'
  @Get('paginated')
  paginated(@Query() q: PaginatedPlayersQueryDto) {
    return this.svc.paginate(q);
  }

  @Get('search/json')
  searchJson(@Query() q: SearchPlayersQueryDto) {
    return this.svc.search(q.name);
  }

  @Get('search/html')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async searchHtml(@Query() q: SearchPlayersQueryDto) {
    const rows = await this.svc.search(q.name);
    return renderPlayersTable(q.name, rows);
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.svc.findOne(id);
  }
}
