import boxen from "boxen"
import chalk from "chalk"
import Table from "cli-table3"
import ora, { type Ora } from "ora"

import type { BuildKind } from "../build-config/types.js"
import { formatMissingFile, getErrorMessage, type MissingFile } from "../errors.js"
import type { ReportedBuild, UploadedArtifact } from "../ketryx/types.js"
import type { CliRenderer, RunHeader } from "./types.js"

export class InteractiveRenderer implements CliRenderer {
  private spinner: Ora | null = null

  header(info: RunHeader): void {
    const body = [
      `${chalk.bold("Config")}     ${info.configPath}`,
      `${chalk.bold("Service")}    ${info.baseUrl}`,
      `${chalk.bold("Project")}    ${info.projectId}`,
      `${chalk.bold("Builds")}     ${info.buildCount}`,
      `${chalk.bold("Ref")}        ${info.reference ?? chalk.gray("none")}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("Ketryx Build Report"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  missingFiles(missing: readonly MissingFile[]): void {
    console.error(chalk.red.bold("\nMissing files:"))
    for (const entry of missing) {
      console.error(chalk.red(`  - ${formatMissingFile(entry)}`))
    }
  }

  buildStarted(name: string, kind: BuildKind): void {
    console.log(chalk.cyan(`${chalk.bold(name)} ${chalk.dim(kind)}`))
  }

  uploadStarted(filePath: string, contentType: string): void {
    this.spinner = ora(`Uploading ${filePath} ${chalk.dim(contentType)}`).start()
  }

  uploadFinished(filePath: string, artifact: UploadedArtifact): void {
    const text = `${filePath} ${chalk.dim(`-> ${artifact.id} (${artifact.type})`)}`
    if (this.spinner) {
      this.spinner.succeed(text)
      this.spinner = null
      return
    }
    console.log(chalk.green(`[OK] ${text}`))
  }

  uploadFailed(filePath: string, error: unknown): void {
    const text = `${filePath}: ${getErrorMessage(error)}`
    if (this.spinner) {
      this.spinner.fail(text)
      this.spinner = null
      return
    }
    console.log(chalk.red(`[ERR] ${text}`))
  }

  buildReported(build: ReportedBuild): void {
    console.log(chalk.green(`Reported ${build.buildName} to Ketryx: ${chalk.bold(build.buildId)}`))
  }

  unknownBuildType(_name: string, type: string): void {
    console.warn(chalk.yellow(`Warning: Unknown build type '${type}'`))
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  runComplete(reported: readonly ReportedBuild[], elapsedSeconds: number): void {
    const table = new Table({
      head: [chalk.bold("Build"), chalk.bold("Build ID")],
    })
    for (const build of reported) {
      table.push([build.buildName, chalk.green(build.buildId)])
    }
    console.log(table.toString())
    console.log(chalk.dim(`Done in ${elapsedSeconds}s`))
  }

  warn(message: string): void {
    this.stopSpinner()
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    this.stopSpinner()
    console.error(chalk.red(message))
  }

  private stopSpinner(): void {
    this.spinner?.stop()
    this.spinner = null
  }
}
