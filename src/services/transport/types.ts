export interface SenderIdentity {
    email: string;
    name?: string;
}

export interface OutboundMessage {
    from: SenderIdentity;
    to: string;
    subject: string;
    body: string;
    replyTo?: string;
}

export interface DeliveryResult {
    success: boolean;
    messageId?: string;
    error?: string;
}

/**
 * Attempts delivery of exactly one message. Retries and pacing belong to the
 * caller; a transport may report failure or throw, and both are treated alike.
 */
export interface MailTransport {
    readonly name: string;
    deliver(message: OutboundMessage): Promise<DeliveryResult>;
    /** Optional pre-flight connection check */
    verify?(): Promise<void>;
}

export function formatAddress(sender: SenderIdentity): string {
    return sender.name ? `${sender.name} <${sender.email}>` : sender.email;
}
