import { Controller, Get, HttpCode, NotFoundException, Param, Post } from '@nestjs/common';
import { FredProvider, MacroSeries, findMacroSeries } from '@libs/market-data';

@Controller('api/v1/macro')
export class MacroController {
  constructor(private readonly fred: FredProvider) {}

  @Post('warm-cache')
  @HttpCode(202)
  async warmCache(): Promise<{ warmed: number; total: number }> {
    const warmed = await this.fred.warmCache();
    return { warmed, total: this.fred.catalog.size };
  }

  @Get(':name')
  async series(@Param('name') name: string): Promise<MacroSeries> {
    if (!findMacroSeries(name)) {
      throw new NotFoundException(
        `Unknown series '${name}'. Available: ${[...this.fred.catalog.keys()].join(', ')}`,
      );
    }
    const series = await this.fred.getNamedSeries(name);
    if (!series) {
      throw new NotFoundException(`No data for series '${name}'`);
    }
    return series;
  }
}
