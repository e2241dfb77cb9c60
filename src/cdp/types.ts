export interface CDPSession {
  readonly id?: string | null;
  send<T = unknown>(method: string, params?: object): Promise<T>;
  on<TPayload = unknown>(event: string, handler: (payload: TPayload) => void): void;
  off?<TPayload = unknown>(event: string, handler: (payload: TPayload) => void): void;
  detach(): Promise<void>;
}
