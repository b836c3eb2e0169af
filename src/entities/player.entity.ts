import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

// Clave natural (name, team): es la única regla de identidad del import.
@Entity({ name: 'player' })
@Index('ux_player_name_team', ['name', 'team'], { unique: true })
export class Player {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  name!: string;

  @Column({ type: 'text' })
  team!: string;

  @Column({ type: 'text', nullable: true })
  position!: string | null; // p.ej. "Forward / Midfielder"

  @Column({ type: 'text', name: 'understat_id', nullable: true })
  understatId!: string | null;

  @Column({ type: 'int', default: 0 })
  matches!: number;

  @Column({ type: 'int', default: 0 })
  minutes!: number;

  @Column({ type: 'int', default: 0 })
  goals!: number;

  @Column({ type: 'int', default: 0 })
  assists!: number;

  @Column({ type: 'int', default: 0 })
  shots!: number;

  @Column({ type: 'int', name: 'key_passes', default: 0 })
  keyPasses!: number;

  @Column({ type: 'int', name: 'yellow_cards', default: 0 })
  yellowCards!: number;

  @Column({ type: 'int', name: 'red_cards', default: 0 })
  redCards!: number;

  @Column({ type: 'double precision', default: 0 })
  xg!: number;

  @Column({ type: 'double precision', default: 0 })
  xa!: number;

  @Column({ type: 'timestamptz', name: 'last_updated', default: () => 'NOW()' })
  lastUpdated!: Date;

  @Column({ type: 'timestamptz', name: 'created_at', default: () => 'NOW()' })
  createdAt!: Date;
}
