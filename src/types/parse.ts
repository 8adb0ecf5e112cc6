export type ExtractionStatus = 'ok' | 'empty' | 'failed'

export type Extraction =
    | { status: 'ok'; text: string }
    | { status: 'empty'; text: string }
    | { status: 'failed'; text: string; error: string }

// skipped: there was nothing to send; empty: the service answered without text
export type SummaryStatus = 'ok' | 'skipped' | 'empty' | 'failed'

export type SummaryOutcome =
    | { status: 'ok' | 'skipped' | 'empty'; summary: string }
    | { status: 'failed'; summary: string; error: string }

export type FileDiagnostics = {
    length: number
    status: ExtractionStatus
    error?: string
}

export type PathParseResponse = {
    message: 'Parsed (from path)'
    summary: string
    summaryStatus: SummaryStatus
    extractionStatus: ExtractionStatus
    summaryError?: string
    extractionError?: string
}

export type UploadParseResponse = {
    message: 'Parsed successfully'
    diagnostics: Record<string, FileDiagnostics>
    summary: string
    summaryStatus: SummaryStatus
    summaryError?: string
}

export interface TextSource {
    extract(filePath: string): Promise<Extraction>
}

export interface SummarySource {
    summarize(text: string): Promise<SummaryOutcome>
}

export type ParseDeps = {
    extractor: TextSource
    summarizer: SummarySource
    uploadDir: string
    maxFileSizeBytes?: number
}
