export interface DeviceCommand {
  command_id: string;
  action: string;
  parameters: Record<string, unknown>;
  timestamp: string;
}
