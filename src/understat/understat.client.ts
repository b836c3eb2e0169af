import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { RawPlayerRecord } from './dto/understat.dto';
import { extractPlayers, toUnderstatLeague } from './understat.helpers';
import { FetchError, errorMessage } from '../import/import.errors';

const DEFAULT_BASE_URL = 'https://understat.com';
const DEFAULT_TIMEOUT_MS = 15000;

@Injectable()
export class UnderstatClient {
  private readonly logger = new Logger(UnderstatClient.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(private readonly http: HttpService, cfg: ConfigService) {
    this.baseUrl = (cfg.get<string>('UNDERSTAT_BASE_URL') || DEFAULT_BASE_URL).replace(/\/+$/, '');
    const timeout = Number(cfg.get<string>('UNDERSTAT_TIMEOUT_MS'));
    this.timeoutMs = Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS;
    this.userAgent = cfg.get<string>('UNDERSTAT_UA') || 'epl-stats-api/1.0';
  }

  leagueUrl(league: string, season: string): string {
    return `${this.baseUrl}/league/${encodeURIComponent(toUnderstatLeague(league))}/${encodeURIComponent(season.trim())}`;
  }

  /**
   * Descarga todas las filas de jugadores de una liga/temporada en una sola llamada.
   * Sin reintentos: cualquier fallo invalida el run completo.
   */
  async fetchLeaguePlayers(league: string, season: string): Promise<RawPlayerRecord[]> {
    if (!league?.trim()) throw new FetchError('league is required');
    if (!season?.trim()) throw new FetchError('season is required');

    const url = this.leagueUrl(league, season);
    let body: unknown;
    try {
      const res = await firstValueFrom(
        this.http.get<unknown>(url, {
          headers: {
            'Accept': 'text/html,application/json',
            'User-Agent': this.userAgent,
          },
          timeout: this.timeoutMs,
        }),
      );
      body = res.data;
    } catch (e) {
      this.logger.error(`Understat GET ${url} failed: ${errorMessage(e)}`);
      throw new FetchError(`Understat request failed: ${errorMessage(e)}`, { cause: e });
    }

    const rows = extractPlayers(body);
    if (!rows) {
      throw new FetchError(`Malformed Understat payload for ${toUnderstatLeague(league)} ${season}`);
    }
    this.logger.log(`Understat ${toUnderstatLeague(league)} ${season}: ${rows.length} players`);
    return rows;
  }
}
