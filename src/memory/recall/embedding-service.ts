/**
 * Embedding Service
 * Generates vector embeddings using OpenAI/Azure OpenAI
 */

import { z } from 'zod'
import type { EmbeddingConfig } from '../../config/schema.js'
import type { Embedder } from './types.js'

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
})

export class EmbeddingService implements Embedder {
  constructor(private config: EmbeddingConfig) {}

  async embed(text: string): Promise<number[]> {
    if (this.config.provider === 'azure-openai') {
      return this.embedAzure(text)
    } else {
      return this.embedOpenAI(text)
    }
  }

  private async embedAzure(text: string): Promise<number[]> {
    if (this.config.provider !== 'azure-openai') {
      throw new Error('Invalid provider')
    }

    const { endpoint, deploymentName, apiKey, apiVersion } = this.config
    const url = `${endpoint}/openai/deployments/${deploymentName}/embeddings?api-version=${apiVersion}`

    return this.request(url, { 'api-key': apiKey }, { input: text }, 'Azure OpenAI')
  }

  private async embedOpenAI(text: string): Promise<number[]> {
    if (this.config.provider !== 'openai') {
      throw new Error('Invalid provider')
    }

    const { apiKey, model, baseUrl } = this.config
    const url = `${baseUrl}/embeddings`

    return this.request(url, { Authorization: `Bearer ${apiKey}` }, { input: text, model }, 'OpenAI')
  }

  private async request(
    url: string,
    auth: Record<string, string>,
    body: Record<string, unknown>,
    label: string
  ): Promise<number[]> {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...auth,
      },
      body: JSON.stringify(body),
    })

    if (!response.ok) {
      const error = await response.text()
      throw new Error(`${label} API error: ${response.status} - ${error}`)
    }

    const data = EmbeddingResponseSchema.parse(await response.json())
    return data.data[0].embedding
  }
}
