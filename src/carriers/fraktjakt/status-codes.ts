import { ShippingStatus, TrackResult } from '../../domain/models';

export enum ReplyCode {
    Success = 0,
    Warning = 1,
    Failure = 2,
}

const SHIPPING_STATUS_LABELS: Record<ShippingStatus, string> = {
    [ShippingStatus.HandledBySender]: 'Handled by the sender',
    [ShippingStatus.Sent]: 'Sent',
    [ShippingStatus.Delivered]: 'Delivered',
    [ShippingStatus.Signed]: 'Signed',
    [ShippingStatus.Returned]: 'Returned',
};

export function isKnownReplyCode(code: number): code is ReplyCode {
    return code === ReplyCode.Success || code === ReplyCode.Warning || code === ReplyCode.Failure;
}

export function isShippingStatus(id: number): id is ShippingStatus {
    return Object.prototype.hasOwnProperty.call(SHIPPING_STATUS_LABELS, id);
}

export function describeShippingStatus(id: number): string {
    return isShippingStatus(id) ? SHIPPING_STATUS_LABELS[id] : `Unknown status ${id}`;
}

/** One line per shipping state, labelled from the normalized status. */
export function describeTrackResult(result: TrackResult): string {
    return `${result.shipmentId}: ${result.name} (${describeShippingStatus(result.statusId)})`;
}
