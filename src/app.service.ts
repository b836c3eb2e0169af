import { Injectable } from '@nestjs/common';

export interface Welcome {
  message: string;
  docs: string | null;
  endpoints: string[];
}

@Injectable()
export class AppService {
  getWelcome(): Welcome {
    const swaggerEnabled = process.env.ENABLE_SWAGGER?.toLowerCase() !== 'false';
    return {
      message: 'Football Stats API: Premier League player statistics',
      docs: swaggerEnabled ? '/docs' : null,
      endpoints: [
        '/api/players',
        '/api/players/paginated',
        '/api/players/search/json',
        '/api/players/search/html',
        '/api/players/:id',
        '/api/health',
      ],
    };
  }
}
