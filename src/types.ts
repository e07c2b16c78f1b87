// src/types.ts

export type HeatPumpMode = 'heat' | 'cool' | 'off';

/** Key of the heat pump schedule block in config.yaml */
export type HvacScheduleKey = 'heating' | 'cooling';

export type DayType = 'weekday' | 'weekend';

export type FieldValue = string | number | null;

/** Fields read from one Home Assistant entity */
export interface DeviceState {
  state: FieldValue;
  last_changed: FieldValue;
  temperature?: FieldValue;
  current_temperature?: FieldValue;
}

export type DevicesState = Record<string, DeviceState>;

export interface HeatPumpAction {
  state: HeatPumpMode;
  setpoint: number | null;
}

export interface ControlActions {
  heat_pump?: HeatPumpAction;
  zones: Record<string, number>;
}

export interface ZoneMetrics {
  inside_temperature: number;
  target_temperature: number;
  heat_pump_impact: number;
}

export type Command =
  | { entity_id: string; service: 'set_hvac_mode'; hvac_mode: HeatPumpMode }
  | { entity_id: string; service: 'set_temperature'; temperature: number };

export interface CycleReport {
  started_at: string;
  finished_at: string | null;
  ok: boolean;
  error: string | null;
  outside_temperature: number | null;
  heat_pump_mode: HeatPumpMode | null;
  heat_pump_cop: number | null;
  peak_event: { start: string; end: string } | null;
  actions: ControlActions | null;
  commands: Command[];
}
