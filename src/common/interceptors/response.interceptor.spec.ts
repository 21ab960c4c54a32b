import { CallHandler, ExecutionContext, SetMetadata } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import { ResponseInterceptor } from './response.interceptor';

class ExampleController {
  @SetMetadata('response_message', 'Quote accepted.')
  accept() {}

  plain() {}
}

function contextFor(handler: () => void, method: string): ExecutionContext {
  return new ExecutionContextHost([{ method }, {}, undefined], ExampleController, handler);
}

const handlerReturning = (data: unknown): CallHandler => ({ handle: () => of(data) });

describe('ResponseInterceptor', () => {
  const interceptor = new ResponseInterceptor();
  const controller = new ExampleController();

  it('uses the route message when one is set', async () => {
    const result = await lastValueFrom(
      interceptor.intercept(contextFor(controller.accept, 'POST'), handlerReturning({ id: 'q1' })),
    );

    expect(result).toEqual({ success: true, data: { id: 'q1' }, message: 'Quote accepted.' });
  });

  it('falls back to a message carried by the payload', async () => {
    const result = await lastValueFrom(
      interceptor.intercept(contextFor(controller.plain, 'GET'), handlerReturning({ message: 'Done' })),
    );

    expect(result.message).toBe('Done');
  });

  it.each([
    ['POST', 'Created successfully.'],
    ['PATCH', 'Updated successfully.'],
    ['DELETE', 'Deleted successfully.'],
    ['GET', 'OK.'],
  ])('defaults the message for %s', async (method, message) => {
    const result = await lastValueFrom(
      interceptor.intercept(contextFor(controller.plain, method), handlerReturning(null)),
    );

    expect(result).toEqual({ success: true, data: null, message });
  });
});
