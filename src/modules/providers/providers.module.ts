import { Module } from '@nestjs/common';
import { AppConfigModule } from '../app/app-config.module';
import { ProviderGatewayService } from './provider-gateway.service';
import { GENERATION_PROVIDER } from './generation/generation-provider';
import { OpenAiGenerationProvider } from './generation/openai-generation.provider';
import { SEARCH_PROVIDER } from './search/search-provider';
import { SerpApiSearchProvider } from './search/serpapi-search.provider';

@Module({
  imports: [AppConfigModule],
  providers: [
    { provide: SEARCH_PROVIDER, useClass: SerpApiSearchProvider },
    { provide: GENERATION_PROVIDER, useClass: OpenAiGenerationProvider },
    ProviderGatewayService,
  ],
  exports: [ProviderGatewayService],
})
export class ProvidersModule {}
