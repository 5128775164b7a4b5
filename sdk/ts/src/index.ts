export interface HealthResponse {
  ok: boolean;
}

export interface PlayerResponse {
  player_id: number;
  name: string;
}

export interface MatchReport {
  winner_id: number;
  loser_id: number;
  tournament_id?: number | null;
}

export interface MatchResponse {
  match_id: number;
  winner_id: number;
  loser_id: number;
  tournament_id: number | null;
}

export interface StandingResponse {
  rank: number;
  player_id: number;
  name: string;
  wins: number;
  matches: number;
  opponent_match_wins: number;
}

export interface StandingsResponse {
  tournament_id: number | null;
  standings: StandingResponse[];
}

export interface PairingResponse {
  player1_id: number;
  name1: string;
  player2_id: number;
  name2: string;
}

export interface PairingsResponse {
  tournament_id: number | null;
  pairings: PairingResponse[];
}

export interface PlayerCountResponse {
  tournament_id: number | null;
  count: number;
}

export interface DeleteResponse {
  deleted: number;
}

export interface SwissTournamentClientOptions {
  baseUrl: string;
  token?: string;
  fetchImpl?: typeof fetch;
  defaultHeaders?: Record<string, string>;
}

export class SwissTournamentError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'SwissTournamentError';
  }
}

const withTournament = (path: string, tournamentId?: number | null) =>
  tournamentId === undefined || tournamentId === null ? path : `${path}?tournament_id=${tournamentId}`;

export class SwissTournamentClient {
  private readonly baseUrl: URL;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: SwissTournamentClientOptions) {
    this.baseUrl = new URL(options.baseUrl);
    this.token = options.token;
    const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
    if (!fetchImpl) {
      throw new Error('Global fetch implementation not found. Pass options.fetchImpl explicitly.');
    }
    this.fetchImpl = fetchImpl;

    this.defaultHeaders = {
      'Content-Type': 'application/json',
      ...options.defaultHeaders,
    };
  }

  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>('/health', { method: 'GET' });
  }

  async registerPlayer(name: string): Promise<PlayerResponse> {
    return this.request<PlayerResponse>('/v1/players', {
      method: 'POST',
      body: JSON.stringify({ name }),
    });
  }

  async listPlayers(): Promise<PlayerResponse[]> {
    const body = await this.request<{ players: PlayerResponse[] }>('/v1/players', { method: 'GET' });
    return body.players;
  }

  async countPlayers(tournamentId?: number | null): Promise<number> {
    const body = await this.request<PlayerCountResponse>(withTournament('/v1/players/count', tournamentId), {
      method: 'GET',
    });
    return body.count;
  }

  async reportMatch(match: MatchReport): Promise<MatchResponse> {
    return this.request<MatchResponse>('/v1/matches', {
      method: 'POST',
      body: JSON.stringify(match),
    });
  }

  async standings(tournamentId?: number | null): Promise<StandingsResponse> {
    return this.request<StandingsResponse>(withTournament('/v1/standings', tournamentId), { method: 'GET' });
  }

  async pairings(tournamentId?: number | null): Promise<PairingsResponse> {
    return this.request<PairingsResponse>(withTournament('/v1/pairings', tournamentId), { method: 'GET' });
  }

  async clearMatches(): Promise<DeleteResponse> {
    return this.request<DeleteResponse>('/v1/matches', { method: 'DELETE' });
  }

  async clearPlayers(): Promise<DeleteResponse> {
    return this.request<DeleteResponse>('/v1/players', { method: 'DELETE' });
  }

  private async request<T>(path: string, init: RequestInit): Promise<T> {
    const url = new URL(path, this.baseUrl);
    const headers = new Headers(this.defaultHeaders);
    if (init.headers) {
      new Headers(init.headers).forEach((value, key) => headers.set(key, value));
    }
    if (this.token) {
      headers.set('Authorization', `Bearer ${this.token}`);
    }

    const response = await this.fetchImpl(url, { ...init, headers });
    if (!response.ok) {
      throw new SwissTournamentError(
        `Request to ${url.pathname} failed with status ${response.status}`,
        response.status,
        await this.safeParseBody(response)
      );
    }

    return (await this.safeParseBody(response)) as T;
  }

  private async safeParseBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    return response.text();
  }
}
