export {ProcessRunner, type LogLine, type OnLogLine} from './process-runner.js'
export {ExecaProcessRunner} from './execa-process-runner.js'
export {ContainerRuntime} from './container-runtime.js'
export {DockerCliRuntime, buildRunArgs} from './docker-runtime.js'
export type {RunProcessRequest, RunProcessResult, StartServiceRequest, ProbeServiceRequest} from './types.js'
export {gitRevision} from './git.js'
