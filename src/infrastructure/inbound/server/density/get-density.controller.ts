// Application
import { type AggregateEventDensityUseCase } from '../../../../application/use-cases/events/aggregate-event-density.use-case.js';

import { type GetDensityHttpQuery, GetDensityRequestHandler } from './get-density-request.handler.js';
import { GetDensityResponsePresenter } from './get-density-response.presenter.js';

export class GetDensityController {
    private readonly requestHandler: GetDensityRequestHandler;
    private readonly responsePresenter: GetDensityResponsePresenter;

    constructor(private readonly aggregateEventDensity: AggregateEventDensityUseCase) {
        this.requestHandler = new GetDensityRequestHandler();
        this.responsePresenter = new GetDensityResponsePresenter();
    }

    async getDensity(rawQuery: GetDensityHttpQuery) {
        const validatedParams = this.requestHandler.handle(rawQuery);

        const points = await this.aggregateEventDensity.execute({
            minCount: validatedParams.minCount,
        });

        return this.responsePresenter.present(points);
    }
}
