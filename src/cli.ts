#!/usr/bin/env node

import { mkdir } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { DifferentialExtractor } from "./differential.js";
import { loadImage, parseBitDepth, savePng } from "./image-io.js";
import {
  buildDifferentialConfig,
  buildVoronoiConfig,
  type DifferentialOptions,
  differentialOutputName,
  type VoronoiOptions,
} from "./options.js";
import { VoronoiGenerator } from "./voronoi.js";

const program = new Command();

program
  .name("procedural-maps")
  .description("Voronoi texture generation and differential map tools")
  .version("1.0.0");

// Voronoi command
program
  .command("voronoi")
  .description("Generate a Voronoi texture from a jittered 3-D cell lattice")
  .option("-o, --output <path>", "Output file path", "./voronoi.png")
  .option("-W, --width <number>", "Output width in pixels", "512")
  .option("-H, --height <number>", "Output height in pixels", "512")
  .option("--cell-size <number>", "Cell size in pixels", "128")
  .option("--scale-x <number>", "Horizontal cell scale", "1")
  .option("--scale-y <number>", "Vertical cell scale", "1")
  .option("--scale-w <number>", "Scale of the W axis", "100")
  .option("--seed <number>", "Random seed", "0")
  .option("--randomness <number>", "Feature point jitter (0-1)", "1")
  .option(
    "--metric <name>",
    "Distance metric (euclidean, manhattan, chebyshev, minkowski)",
    "euclidean"
  )
  .option("--exponent <number>", "Minkowski exponent (min 0.1)", "2")
  .option("--smoothness <number>", "Cell boundary blend width (0-1)", "0")
  .option("--w <number>", "Position along the W axis (animate for motion)", "0")
  .option("--offset-x <number>", "Horizontal lattice offset in pixels", "0")
  .option("--offset-y <number>", "Vertical lattice offset in pixels", "0")
  .option(
    "--mode <name>",
    "Output (color, position, smooth-distance, nearest-distance, distance-gap)",
    "color"
  )
  .option("--clamp", "Clamp output values to 0-1", false)
  .option("--alpha-from <path>", "Take alpha from this image")
  .option("--depth <bits>", "PNG bit depth (8 or 16)", "8")
  .option("--band-rows <number>", "Render in horizontal bands of this height")
  .option("-v, --verbose", "Show detailed progress", false)
  .action(async (options: VoronoiOptions) => {
    try {
      const config = buildVoronoiConfig(options);
      const depth = parseBitDepth(options.depth);
      const outputPath = path.resolve(options.output);

      if (options.alphaFrom) {
        const alphaPath = path.resolve(options.alphaFrom);
        console.log(`Alpha source: ${alphaPath}`);
        config.alphaSource = await loadImage(alphaPath);
      }

      if (!options.verbose) {
        console.log(`Generating ${config.width}×${config.height} Voronoi texture`);
        console.log(`Mode: ${config.renderMode}`);
        console.log(`Metric: ${config.metric}`);
        console.log(`Seed: ${config.seed}`);
        console.log(`Output: ${outputPath}`);
        console.log("");
      }

      const generator = new VoronoiGenerator(config);
      const result = generator.generate();

      await savePng(result, outputPath, depth);

      console.log("");
      console.log("Done!");
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Differential command
program
  .command("differential")
  .description("Generate a gradient map from an image")
  .argument("<input>", "Path to input image")
  .option("-o, --output <path>", "Output directory", "output")
  .option("-a, --axis <name>", "Derivative axis (x, y, magnitude)", "x")
  .option("-e, --edge <name>", "Edge mode (none, repeat, tile, mirror)", "repeat")
  .option(
    "-r, --response <name>",
    "Out of range handling (clamp, soft-clamp, mirror, wrap, identity)",
    "soft-clamp"
  )
  .option("--offset <number>", "Output level for a zero derivative", "0.5")
  .option("--scale <number>", "Derivative gain", "1")
  .option("--keep-alpha", "Keep the source alpha channel", false)
  .option("--depth <bits>", "PNG bit depth (8 or 16)", "8")
  .option("--band-rows <number>", "Render in horizontal bands of this height")
  .option("-v, --verbose", "Show detailed progress", false)
  .action(async (input: string, options: DifferentialOptions) => {
    try {
      const config = buildDifferentialConfig(options);
      const depth = parseBitDepth(options.depth);
      const inputPath = path.resolve(input);
      const outputDir = path.resolve(options.output);
      const outputPath = path.join(
        outputDir,
        differentialOutputName(input, config.axis)
      );

      console.log(`Processing: ${inputPath}`);
      console.log(`Output: ${outputPath}`);
      console.log(`Axis: ${config.axis}`);
      console.log(`Edge mode: ${config.edgeMode}`);
      console.log(`Response: ${config.responseMode}`);

      const source = await loadImage(inputPath);
      const extractor = new DifferentialExtractor(config);
      const result = extractor.extract(source);

      await mkdir(outputDir, { recursive: true });
      await savePng(result, outputPath, depth);

      console.log("Done!");
    } catch (error) {
      console.error("Error:", error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

await program.parseAsync();
