import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository, SelectQueryBuilder } from 'typeorm';
import { Player } from '../entities/player.entity';
import {
  ListPlayersQueryDto,
  PaginatedPlayers,
  PaginatedPlayersQueryDto,
} from '../dto/player.dto';

const SEARCH_LIMIT = 100;

// % y _ son comodines en LIKE; el usuario busca texto literal
export function likePattern(term: string): string {
  return `%${term.trim().replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

@Injectable()
export class PlayersService {
  constructor(@InjectRepository(Player) private readonly players: Repository<Player>) {}

  private nameOrTeam(qb: SelectQueryBuilder<Player>, term: string) {
    return qb.andWhere(
      new Brackets((w) => {
        w.where('p.name ILIKE :term', { term: likePattern(term) })
          .orWhere('p.team ILIKE :term', { term: likePattern(term) });
      }),
    );
  }

  async list(q: ListPlayersQueryDto): Promise<Player[]> {
    const qb = this.players.createQueryBuilder('p');
    if (q.name?.trim()) qb.andWhere('p.name ILIKE :name', { name: likePattern(q.name) });
    if (q.team?.trim()) qb.andWhere('p.team ILIKE :team', { team: likePattern(q.team) });
    if (q.position?.trim()) qb.andWhere('p.position ILIKE :pos', { pos: likePattern(q.position) });

    return qb
      .orderBy('p.id', 'ASC')
      .skip(q.offset ?? 0)
      .take(q.limit ?? 20)
      .getMany();
  }

  async paginate(q: PaginatedPlayersQueryDto): Promise<PaginatedPlayers<Player>> {
    const page = q.page ?? 1;
    const perPage = q.per_page ?? 10;

    const qb = this.players.createQueryBuilder('p');
    if (q.name?.trim()) this.nameOrTeam(qb, q.name);

    const [rows, total] = await qb
      .orderBy('p.id', 'ASC')
      .skip((page - 1) * perPage)
      .take(perPage)
      .getManyAndCount();

    return {
      players: rows,
      total_items: total,
      total_pages: Math.ceil(total / perPage),
      current_page: page,
      per_page: perPage,
    };
  }

  async search(term: string): Promise<Player[]> {
    const qb = this.players.createQueryBuilder('p');
    this.nameOrTeam(qb, term);
    return qb.orderBy('p.name', 'ASC').addOrderBy('p.id', 'ASC').take(SEARCH_LIMIT).getMany();
  }

  async findOne(id: number): Promise<Player> {
    const player = await this.players.findOne({ where: { id } });
    if (!player) throw new NotFoundException(`Player ${id} not found`);
    return player;
  }
}
