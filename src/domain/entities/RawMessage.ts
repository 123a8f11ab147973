export interface RawMessage {
  readonly text: string;
  readonly sourceTimestamp?: string | Date | null;
  readonly fileCreatedAt?: string | Date | null;
}
