/**
 * 作業単位（UnitOfWork）の入力ポート
 *
 * アプリケーションサービスは集約を変更した後に commit() を呼ぶだけでよい。
 * イベントの収集・保存・配信は実装側が行う。
 */
export interface UnitOfWork {
    /**
     * 追跡中の変更をコミットし、発生したドメインイベントを伝播する
     *
     * @throws EventPropagationException コミット後の伝播に失敗した場合（書き込みは確定済み）
     * @throws Error コミット前に失敗した場合（ロールバック済み）
     */
    commit(): Promise<void>

    /**
     * 作業単位が所有する書き込みストア（追跡中の変更）を解放する
     *
     * イベントストアはプロセス全体で共有しているので、ここでは解放しない（closeContainer で解放する）。
     */
    dispose(): Promise<void>
}

export const UnitOfWorkToken = Symbol('UnitOfWork')
