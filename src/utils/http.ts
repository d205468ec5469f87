export type HttpHeaders = Record<string, string>

export interface HttpResponse<TBody> {
  status: number
  contentType: string
  body: TBody
}

export const bearerHeaders = (apiKey: string): HttpHeaders => ({
  authorization: `Bearer ${apiKey}`,
})

const readResponseText = async (response: Response): Promise<HttpResponse<string>> => ({
  status: response.status,
  contentType: response.headers.get("content-type") ?? "",
  body: await response.text(),
})

// Status handling is left to the caller: a non-2xx body is part of the result.

export const httpPostForm = async (
  url: string,
  form: FormData,
  headers: HttpHeaders,
  signal?: AbortSignal,
): Promise<HttpResponse<string>> => {
  const response = await fetch(url, {
    method: "POST",
    headers,
    body: form,
    signal,
  })
  return readResponseText(response)
}

export const httpPostJson = async (
  url: string,
  body: unknown,
  headers: HttpHeaders,
  signal?: AbortSignal,
): Promise<HttpResponse<string>> => {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      ...headers,
    },
    body: JSON.stringify(body),
    signal,
  })
  return readResponseText(response)
}

/** Parses a response body as JSON, returning `undefined` when it is not JSON. */
export const parseJsonBody = (body: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(body)
    return parsed
  } catch {
    return undefined
  }
}
