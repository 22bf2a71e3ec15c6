import { createApp } from './app.js';
import { config } from './config/index.js';
import { FileProjectRepository } from './repositories/projectRepository.js';
import { createImageClient, createTextGenerator } from './services/ai/router.js';
import { ProjectOrchestrator } from './services/project/projectOrchestrator.js';
import { AISceneSummarizer } from './services/story/sceneSummarizer.js';
import { StoryGenerator } from './services/story/storyGenerator.js';
import { VisualContextService } from './services/visual/visualContext.js';
import logger from './utils/logger.js';

const textGenerator = createTextGenerator();
const imageClient = createImageClient();

const orchestrator = new ProjectOrchestrator({
  storyGenerator: new StoryGenerator({ textGenerator }),
  visual: new VisualContextService({
    imageClient,
    summarizer: new AISceneSummarizer(textGenerator),
  }),
  repository: new FileProjectRepository(config.dataDir),
});

const app = createApp({ orchestrator });

app.listen(config.port, () => {
  logger.info('SERVER', `Listening on port ${config.port}`, {
    mode: config.nodeEnv,
    textProvider: textGenerator.provider,
    imageProvider: imageClient.provider,
    dataDir: config.dataDir,
  });
  console.log(`
╔═══════════════════════════════════════════════╗
║              Storyloom API Server             ║
╚═══════════════════════════════════════════════╝
  Port:    ${config.port}
  Mode:    ${config.nodeEnv}
  Text:    ${textGenerator.provider}
  Images:  ${imageClient.provider}
  Logs:    ${logger.getLogPath()}
  `);
});
