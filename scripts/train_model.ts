import { FileStorage, loadConfig, packageArtifact, trainModel } from '../engine';

// Usage: tsx scripts/train_model.ts [output path]
const config = loadConfig();
const outputPath = process.argv[2] ?? config.model.modelPath;

async function main() {
    console.log('Training risk model on synthetic data...');
    const { artifact } = trainModel();

    const { blob, hash } = await packageArtifact(artifact);
    await new FileStorage().put(outputPath, blob);

    console.log(`Trees: ${artifact.scorer.nEstimators}, samples: ${artifact.sampleCount}, seed: ${artifact.seed}`);
    console.log(`Saved ${blob.length} bytes to ${outputPath}`);
    console.log(`Artifact ID: ${hash}`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
