import type { ValueObservable } from '@/utils/value-publisher';

export type TrackingConsent = 'granted' | 'not-granted' | 'pending';

export type UserInfo = {
    readonly id?: string;
    readonly name?: string;
    readonly email?: string;
    readonly extraInfo?: Readonly<Record<string, unknown>>;
};

export type NetworkReachability = 'yes' | 'no' | 'maybe';

export type NetworkInterface = 'wifi' | 'wiredEthernet' | 'cellular' | 'loopback' | 'other';

export type NetworkConnectionInfo = {
    readonly reachability: NetworkReachability;
    readonly availableInterfaces?: readonly NetworkInterface[];
    readonly supportsIPv4?: boolean;
    readonly supportsIPv6?: boolean;
    readonly isExpensive?: boolean;
    readonly isConstrained?: boolean;
};

export type CarrierInfo = {
    readonly carrierName?: string;
    readonly carrierISOCountryCode?: string;
    readonly carrierAllowsVOIP: boolean;
    readonly radioAccessTechnology: string;
};

/** The last view reported by the UI layer. */
export type ViewEvent = {
    readonly viewId: string;
    readonly name: string;
    readonly url: string;
    readonly timestampMs: number;
    readonly sessionId?: string;
};

/**
 * Session-wide context attached to out-of-band artifacts such as crash reports.
 * Each field holds the latest value seen for it; fields are not updated together.
 */
export type ContextSnapshot = {
    readonly trackingConsent: TrackingConsent;
    readonly userInfo: UserInfo;
    readonly networkConnectionInfo?: NetworkConnectionInfo;
    readonly carrierInfo?: CarrierInfo;
    readonly lastViewEvent?: ViewEvent;
};

export type ContextSnapshotSources = {
    readonly trackingConsent: ValueObservable<TrackingConsent>;
    readonly userInfo: ValueObservable<UserInfo>;
    readonly networkConnectionInfo: ValueObservable<NetworkConnectionInfo | undefined>;
    readonly carrierInfo: ValueObservable<CarrierInfo | undefined>;
    readonly lastViewEvent: ValueObservable<ViewEvent | undefined>;
};
