import type { Headers, HeadersManifest } from '../../../types/index.js';
import type { ResolutionContext } from '../context.js';

export async function headersFromManifest(manifest: HeadersManifest, ctx: ResolutionContext): Promise<Headers> {
  const group = async (pattern: string | undefined): Promise<string[]> =>
    pattern === undefined ? [] : ctx.globs.resolve(ctx.path, pattern);

  return {
    public: await group(manifest.public),
    private: await group(manifest.private),
    project: await group(manifest.project),
  };
}
