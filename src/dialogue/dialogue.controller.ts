import { Body, Controller, Logger, Post, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getDefaultQualityTier, getDefaultSampleRate, getDialogueLimits } from '../config/dialogue.config';
import { DialogueAssemblerService } from './dialogue-assembler.service';
import { parseQualityTier, parseSampleRate, parseTurnInputs } from './dialogue-input';
import { abortOnDisconnect, artifactOrThrow, DownloadResponse, sendArtifact } from './dialogue-response';

@Controller('dialogue')
export class DialogueController {
  private readonly logger = new Logger(DialogueController.name);

  constructor(
    private readonly assembler: DialogueAssemblerService,
    private readonly configService: ConfigService,
  ) {}

  @Post('generate')
  async generate(
    @Res() res: DownloadResponse,
    @Body('turns') rawTurns: unknown,
    @Body('qualityTier') qualityTier?: unknown,
    @Body('sampleRate') sampleRate?: unknown,
  ) {
    const { maxTurns } = getDialogueLimits(this.configService);
    const turns = parseTurnInputs(rawTurns, maxTurns);
    const outcome = await this.assembler.assemble({
      turns,
      qualityTier: parseQualityTier(qualityTier, getDefaultQualityTier(this.configService)),
      sampleRate: parseSampleRate(sampleRate, getDefaultSampleRate(this.configService)),
      signal: abortOnDisconnect(res),
    });
    const artifact = artifactOrThrow(outcome);
    this.logger.log(`Sending ${artifact.fileName} (${artifact.audio.length} bytes)`);
    sendArtifact(res, artifact);
  }
}
