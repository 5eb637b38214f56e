/**
 * イベント名 → ペイロード型の対応表。
 * ペイロードを持たないイベントは void を指定する。
 */
export type EventMap = Record<string, unknown>;

export type Listener<T> = (payload: T) => void;

/**
 * on() が返す登録ハンドル。off() に渡して登録を解除する。
 */
export interface ListenerToken {
  readonly event: string;
  readonly id: number;
}

export type ListenerErrorHandler = (event: string, error: unknown) => void;

interface Registration<T> {
  readonly token: ListenerToken;
  readonly listener: Listener<T>;
}

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Array<Registration<Events[K]>>;
};

/**
 * アプリケーション層: イベントリスナーの登録簿
 *
 * 責務: イベントごとにコールバックのリストを保持し、登録順に呼び出す。
 * 1つのリスナーが例外を投げても、残りのリスナーには配信される。
 */
export class ListenerRegistry<Events extends EventMap> {
  private table: ListenerTable<Events> = {};
  private readonly removers = new Map<number, () => void>();
  private nextId = 1;

  /**
   * @param onError リスナーが例外を投げたときの通知先（未指定の場合は console.error）
   */
  constructor(private readonly onError?: ListenerErrorHandler) {}

  on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): ListenerToken {
    const token: ListenerToken = Object.freeze({ event, id: this.nextId++ });
    const list = this.table[event] ?? [];
    const registration: Registration<Events[K]> = { token, listener };
    list.push(registration);
    this.table[event] = list;

    this.removers.set(token.id, () => {
      const index = list.indexOf(registration);
      if (index !== -1) {
        list.splice(index, 1);
      }
    });
    return token;
  }

  /**
   * 登録を解除する。
   * @returns 登録が存在して解除できた場合は true
   */
  off(token: ListenerToken): boolean {
    const remove = this.removers.get(token.id);
    if (!remove) {
      return false;
    }
    remove();
    this.removers.delete(token.id);
    return true;
  }

  emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
    const list = this.table[event];
    if (!list || list.length === 0) {
      return;
    }

    // 配信中に off() されても走査が崩れないようにコピーしてから回す
    for (const { listener } of [...list]) {
      try {
        listener(payload);
      } catch (error) {
        this.reportError(event, error);
      }
    }
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.table[event]?.length ?? 0;
  }

  /** すべての登録を破棄する。発行済みのトークンは無効になる。 */
  clear(): void {
    this.table = {};
    this.removers.clear();
  }

  private reportError(event: string, error: unknown): void {
    if (this.onError) {
      this.onError(event, error);
      return;
    }
    console.error(`[ListenerRegistry] listener for "${event}" threw:`, error);
  }
}
