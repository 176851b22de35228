/**
 * Contract shared by the generative-model backends.
 */

export interface MediaAttachment {
    filePath: string;
    mimeType: string;
    displayName?: string;
}

// Provider-side reference to media uploaded once and reused across requests
export interface PreparedMedia {
    name: string;
    uri: string;
    mimeType: string;
}

export interface ModelRequest {
    prompt: string;
    media?: PreparedMedia;
}

export interface ModelReply {
    // null when the provider returned no candidate or no content
    text: string | null;
    model: string;
}

export interface IModelProvider {
    readonly modelName: string;
    readonly supportsMedia: boolean;
    /**
     * Upload media and wait until requests can reference it.
     */
    prepareMedia(media: MediaAttachment): Promise<PreparedMedia>;
    /**
     * Remove prepared media from the provider. Never throws.
     */
    releaseMedia(media: PreparedMedia): Promise<void>;
    generate(request: ModelRequest): Promise<ModelReply>;
}
