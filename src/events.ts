export interface Disposable {
    dispose(): boolean
}

type Handler<Args extends unknown[]> = (...args: Args) => void

export class Emitter<Events extends Record<keyof Events, unknown[]>> {
    protected handlers: { [K in keyof Events]?: Set<Handler<Events[K]>> } = {}

    on<K extends keyof Events>(event: K, handler: Handler<Events[K]>): Disposable {
        const handlers = this.handlers[event] ?? new Set<Handler<Events[K]>>()
        this.handlers[event] = handlers.add(handler)

        return {
            dispose: () => this.off(event, handler)
        }
    }

    once<K extends keyof Events>(event: K, handler: Handler<Events[K]>): Disposable {
        const listener = this.on(event, (...args: Events[K]) => {
            listener.dispose()
            handler(...args)
        })
        return listener
    }

    off<K extends keyof Events>(event: K, handler: Handler<Events[K]>) {
        const handlers = this.handlers[event]
        if (!handlers) return false
        return handlers.delete(handler)
    }

    removeListener = this.off

    emit<K extends keyof Events>(event: K, ...args: Events[K]) {
        const handlers = this.handlers[event]
        if (!handlers || handlers.size == 0) return false;
        [...handlers].forEach(cb => cb(...args))
        return true
    }
}
