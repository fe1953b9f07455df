#!/usr/bin/env node
import { SF } from '@service-launcher/service-framework-node';
import { createExampleContext } from './context.js';
import { createExampleService } from './service.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createExampleContext(processContext);

    const launcher = await createExampleService(context);
    await launcher.run();

    return {
      diagnosticContext: context.diagnosticContext,
      envContext: context.envContext,
    };
  });
}

void bootstrap();
