// Filas crudas tal y como las devuelve Understat (league page → playersData).
// Casi todo llega como string; no hay garantía de identidad ni de completitud.
export type RawPlayerRecord = Record<string, unknown>;

export interface UnderstatPlayerRow {
  id?: string;
  player_name?: string;
  team_title?: string;
  position?: string;       // códigos separados por espacio: "F M S"
  games?: string;
  time?: string;           // minutos
  goals?: string;
  assists?: string;
  shots?: string;
  key_passes?: string;
  xG?: string;
  xA?: string;
  yellow_cards?: string;
  red_cards?: string;
  npg?: string;
  npxG?: string;
  xGChain?: string;
  xGBuildup?: string;
}
