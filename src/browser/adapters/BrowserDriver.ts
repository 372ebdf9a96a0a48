/**
 * Adapter boundary between a browser session and the automation library.
 */

export type NetworkEventKind = 'request' | 'response' | 'finished' | 'failed';

export interface NetworkEvent {
    kind: NetworkEventKind;
    url: string;
    timestamp: number;
    resourceType: string;
    isMainFrame: boolean;
    /** Present on responses */
    status?: number;
    contentType?: string;
    headers?: Record<string, string>;
    failure?: string;
}

/** A function shipped into the page; it must not close over anything. */
export type PageScript<A, R> = (arg: A) => R | Promise<R>;

export interface NavigationOptions {
    timeoutMs: number;
}

export interface BrowserDriver {
    goto(url: string, options: NavigationOptions): Promise<void>;
    currentUrl(): Promise<string>;
    content(): Promise<string>;
    evaluate<A, R>(script: PageScript<A, R>, arg: A): Promise<R>;
    screenshot(): Promise<Buffer>;
    /** Returns and forgets the network events recorded since the previous call. */
    drainNetworkEvents(): NetworkEvent[];
    /** Returns and forgets the texts of native dialogs answered since the previous call. */
    drainAlerts(): string[];
    /** Cookies and storage; used to start a fresh login. */
    clearSession(): Promise<void>;
    close(): Promise<void>;
}
