import { NextRequest } from 'next/server';
import { GenerateRequestSchema, type GenerateRequest } from '@/lib/business-input';
import { errorMessage, isCancellation } from '@/lib/errors';
import { addProgress, completeJob, createJob, failJob, getAbortSignal } from '@/lib/job-store';
import { runPipeline } from '@/lib/pipeline';
import { withProgressCallback, type ProgressEvent, STATUS } from '@/lib/progress';
import type { DocumentContext } from '@/lib/types';

function toDocumentContext(doc: GenerateRequest['documentContext']): DocumentContext | undefined {
  if (!doc || !doc.text.trim()) return undefined;
  return {
    text: doc.text,
    fileNames: doc.fileNames,
    stats: doc.stats ?? { fileCount: doc.fileNames.length, totalChars: doc.text.length, dataPoints: 0 },
  };
}

// Fire-and-poll endpoint: starts pipeline in background, returns jobId immediately
export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return Response.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const parsed = GenerateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return Response.json(
      { error: 'Invalid business input', issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
      { status: 400 }
    );
  }

  const { businessInput } = parsed.data;
  const subject = businessInput.companyName || businessInput.industry || 'unnamed business';
  const job = createJob(subject);
  console.log(`[API] Created job ${job.id} for: ${subject}`);

  runPipelineInBackground(job.id, parsed.data).catch((err) => {
    console.error(`[API] Unhandled error in background pipeline for job ${job.id}:`, err);
    failJob(job.id, errorMessage(err));
  });

  return Response.json({ jobId: job.id });
}

// Background pipeline execution: updates job store with progress
async function runPipelineInBackground(jobId: string, request: GenerateRequest) {
  const sendEvent = (event: ProgressEvent) => addProgress(jobId, event);

  await withProgressCallback(sendEvent, async () => {
    try {
      const result = await runPipeline(request.businessInput, toDocumentContext(request.documentContext), {
        signal: getAbortSignal(jobId),
      });
      console.log(`[Job ${jobId}] Pipeline complete, storing result`);
      completeJob(jobId, result);
    } catch (error) {
      // User-initiated cancellation is not a pipeline error
      if (isCancellation(error)) {
        console.log(`[Job ${jobId}] Pipeline cancelled: ${errorMessage(error)}`);
        failJob(jobId, errorMessage(error));
        return;
      }
      console.error(`[Job ${jobId}] Pipeline error:`, error);
      STATUS.pipelineError(errorMessage(error));
      failJob(jobId, errorMessage(error));
    }
  });
}
