/**
 * Global Options
 *
 * The options that control the tool as a whole, registered in two phases.
 * Bootstrap options are everything needed to construct the execution engine;
 * anything the engine does not consume at construction belongs in the full set.
 */

import { join } from 'path';
import {
  HostEnvironment,
  getCacheDir,
  getConfigDir,
  getDefaultConfigFile,
  isContinuousIntegration,
} from '../config/host-environment';
import { FilesNotFoundBehavior, OwnersNotFoundBehavior } from '../enums/behavior';
import { LogLevelEnum, SPECULATION_STRATEGIES } from '../enums/option-enums';
import { createDefaultExecutionOptions } from '../execution/execution-options';
import { option } from './option-builder';
import type { Registrar } from './option-registry';

const DEFAULT_DISTDIR_NAME = 'dist';

const CACHE_DIR_INSTRUCTIONS =
  'The path may be absolute or relative. If the directory is within the build root, ' +
  'add it to `--pants-ignore` as well.';

/**
 * Register the bootstrap options and mark the bootstrap phase complete
 */
export function registerBootstrapOptions(registrar: Registrar, environment: HostEnvironment): void {
  const { buildroot } = environment;
  const cacheDir = getCacheDir(environment);
  const defaults = createDefaultExecutionOptions(environment);
  const register = registrar.register.bind(registrar);

  // Logging
  register(
    option('--level', '-l')
      .enumOf(LogLevelEnum)
      .default('info')
      .help(`Global log level. One of: ${LogLevelEnum.members.join(', ')}.`)
  );
  register(
    option('--show-log-target')
      .bool()
      .advanced()
      .help('Prefix each log message with the target that emitted it. Pairs with --log-levels-by-target.')
  );
  register(
    option('--log-levels-by-target')
      .dict()
      .advanced()
      .help(
        'Per-target log levels, e.g. {"workunit_store": "info"}. Targets not listed here ' +
          'log at the --level level. Target names are shown by --show-log-target.'
      )
  );
  register(
    option('--log-show-rust-3rdparty')
      .bool()
      .advanced()
      .help('Include log output from third-party crates linked into the engine.')
  );
  register(
    option('--colors')
      .bool()
      .default(environment.stdoutIsTty)
      .help('Use colors in output. Defaults to on when stdout is a terminal.')
  );
  register(
    option('--ignore-pants-warnings')
      .listOf('string')
      .advanced()
      .help(
        'Case-insensitive regexes matched against the start of warning messages; matching ' +
          'warnings are not shown.'
      )
  );

  // Versions and plugins
  register(
    option('--pants-version')
      .advanced()
      .default(environment.toolVersion)
      .daemon()
      .help(
        'The tool version this repository expects. Only used to verify the running version; ' +
          'launcher scripts and editor plugins may read it from the config file.'
      )
  );
  register(
    option('--pants-bin-name')
      .advanced()
      .default('./pants')
      .help('Name of the script used to invoke the tool, as shown in help messages.')
  );
  register(
    option('--plugins')
      .listOf('string')
      .advanced()
      .help('Load backends from these plugin distributions. Their default backends load automatically.')
  );
  register(
    option('--plugins-force-resolve')
      .bool()
      .advanced()
      .help('Resolve plugins again even if a previous resolve is cached.')
  );
  register(
    option('--plugin-cache-dir')
      .dir()
      .advanced()
      .default(join(cacheDir, 'plugins'))
      .help('Cache resolved plugin requirements here.')
  );
  register(
    option('--backend-packages')
      .listOf('string')
      .advanced()
      .help('Load rules from these backend packages.')
  );

  // Directories
  register(
    option('--pants-bootstrapdir')
      .dir()
      .advanced()
      .metavar('<dir>')
      .default(cacheDir)
      .help('Global cache directory.')
  );
  register(
    option('--pants-configdir')
      .dir()
      .advanced()
      .metavar('<dir>')
      .default(getConfigDir(environment))
      .help('Directory for global config files.')
  );
  register(
    option('--pants-workdir')
      .dir()
      .advanced()
      .metavar('<dir>')
      .default(join(buildroot, '.pants.d'))
      .daemon()
      .help('Directory for intermediate output files.')
  );
  register(
    option('--pants-physical-workdir-base')
      .dir()
      .advanced()
      .metavar('<dir>')
      .daemon()
      .help(
        'When set, --pants-workdir becomes a symlink into a per-workspace subdirectory of this ' +
          'directory.'
      )
  );
  register(
    option('--pants-supportdir')
      .dir()
      .advanced()
      .metavar('<dir>')
      .default(join(buildroot, 'build-support'))
      .help('Directory of support files.')
  );
  register(
    option('--pants-distdir')
      .dir()
      .advanced()
      .metavar('<dir>')
      .default(join(buildroot, DEFAULT_DISTDIR_NAME))
      .help('Directory for end-product artifacts.')
  );
  register(
    option('--pants-distdir-legacy-paths')
      .bool()
      .advanced()
      .default(true)
      .help(
        'Write binaries to the unqualified legacy paths under the dist directory. These paths ' +
          'are not qualified by target address and may collide.'
      )
  );
  register(
    option('--pants-subprocessdir')
      .dir()
      .advanced()
      .default(join(buildroot, '.pids'))
      .daemon()
      .help(
        'Directory for subprocess metadata. Keep it outside --pants-workdir so it survives ' +
          'the workdir being cleaned.'
      )
  );

  // Config sources. Their contents, not their paths, reach the fingerprint.
  register(
    option('--pants-config-files')
      .listOf('string')
      .advanced()
      .noFingerprint()
      .default([getDefaultConfigFile(environment)])
      .help('Paths to config files.')
  );
  register(
    option('--pantsrc')
      .bool()
      .advanced()
      .default(true)
      .noFingerprint()
      .help('Read rc files.')
  );
  register(
    option('--pantsrc-files')
      .listOf('string')
      .advanced()
      .metavar('<path>')
      .noFingerprint()
      .default(['/etc/pantsrc', '~/.pants.rc'])
      .help('Rc files that override config values, in the same syntax as --pants-config-files.')
  );
  register(
    option('--pythonpath')
      .listOf('string')
      .advanced()
      .help('Extra directories to search for plugins.')
  );
  register(
    option('--spec-files')
      .listOf('string')
      .noFingerprint()
      .help('Read additional specs (target addresses or file names), one per line, from these files.')
  );
  register(
    option('--spec-file')
      .listOf('string')
      .noFingerprint()
      .deprecated('2.1.0.dev0', 'Use --spec-files')
      .help('Read additional specs from this file, one per line.')
  );
  register(
    option('--verify-config')
      .bool()
      .default(true)
      .advanced()
      .help('Reject config values that do not correspond to a known option.')
  );

  // Filesystem
  register(
    option('--pants-ignore')
      .listOf('string')
      .advanced()
      .default(['.*/', `/${DEFAULT_DISTDIR_NAME}/`])
      .help(
        'Gitignore-style patterns for paths that every filesystem operation skips. The workdir ' +
          'and distdir are always ignored. Applied after the rules of a root .gitignore.'
      )
  );
  register(
    option('--pants-ignore-use-gitignore')
      .bool()
      .advanced()
      .default(true)
      .help('Also honor the rules of a root .gitignore file.')
  );

  // Registered here so that plugins can log while they register
  register(
    option('--logdir', '-d')
      .dir()
      .advanced()
      .metavar('<dir>')
      .daemon()
      .help('Write logs to files under this directory.')
  );

  // Daemon
  register(
    option('--pantsd')
      .bool()
      .advanced()
      .default(true)
      .daemon()
      .help(
        'Run a persistent background daemon that caches filesystem state and rule results ' +
          'between runs.'
      )
  );
  register(
    option('--concurrent')
      .bool()
      .advanced()
      .help(
        'Allow concurrent runs. Runs started while another is in progress skip the daemon ' +
          'instead of waiting for it.'
      )
  );
  // Not daemon-affecting: each client may want its own timeout
  register(
    option('--pantsd-timeout-when-multiple-invocations')
      .float()
      .advanced()
      .default(60.0)
      .help(
        'Seconds to wait for an earlier run to release the daemon before timing out. ' +
          'Use -1 to wait forever.'
      )
  );
  register(
    option('--pantsd-max-memory-usage')
      .int()
      .advanced()
      .default(2 ** 30)
      .help('Maximum memory, in bytes, of the daemon process. There is at most one per workspace.')
  );
  register(
    option('--native-engine-visualize-to')
      .dir()
      .advanced()
      .help('Write execution and rule graphs as `dot` files to this directory, overwriting collisions.')
  );
  register(
    option('--print-stacktrace')
      .bool()
      .advanced()
      .help('Print the full stack trace of any error.')
  );
  register(
    option('--print-exception-stacktrace')
      .bool()
      .advanced()
      .deprecated('2.1.0.dev0', 'Use `--print-stacktrace` instead of `--print-exception-stacktrace`.')
      .help('Print the full stack trace of any error.')
  );
  register(
    option('--pantsd-pailgun-port')
      .int()
      .advanced()
      .default(0)
      .daemon()
      .help('Port the daemon listens on. 0 picks a random port.')
  );
  register(
    option('--pantsd-pailgun-quit-timeout')
      .float()
      .advanced()
      .default(5.0)
      .help('Seconds to wait for further output after signalling the daemon before killing it.')
  );
  register(
    option('--pantsd-log-dir')
      .dir()
      .advanced()
      .daemon()
      .help('Directory for daemon log output.')
  );
  register(
    option('--pantsd-invalidation-globs')
      .listOf('string')
      .advanced()
      .daemon()
      .help(
        'Filesystem events matching these globs restart the daemon. Plugins and config files ' +
          'are always watched.'
      )
  );

  // Local stores and sandboxes
  register(
    option('--local-store-dir')
      .dir()
      .advanced()
      .default(join(cacheDir, 'lmdb_store'))
      .help(`Directory of the local file store holding subprocess results. ${CACHE_DIR_INSTRUCTIONS}`)
  );
  register(
    option('--local-execution-root-dir')
      .dir()
      .advanced()
      .default(environment.tempDir)
      .help(`Directory for local process sandboxes. ${CACHE_DIR_INSTRUCTIONS}`)
  );
  register(
    option('--named-caches-dir')
      .dir()
      .advanced()
      .default(join(cacheDir, 'named_caches'))
      .help(
        `Directory for named caches of tools and processes whose caches are safe to share. ${CACHE_DIR_INSTRUCTIONS}`
      )
  );
  register(
    option('--ca-certs-path')
      .string()
      .advanced()
      .help('PEM file of CA certificates used to verify downloads a build needs.')
  );

  // Remote execution
  register(
    option('--remote-execution')
      .bool()
      .advanced()
      .default(defaults.remoteExecution)
      .help('Run processes on remote workers. Requires --remote-execution-server.')
  );
  register(
    option('--remote-store-server')
      .listOf('string')
      .advanced()
      .default([...defaults.remoteStoreServer])
      .help('host:port of the gRPC servers to use as the remote file store.')
  );
  register(
    option('--remote-store-thread-count')
      .int()
      .advanced()
      .default(defaults.remoteStoreThreadCount)
      .help('Threads in the pool that talks to the remote file store.')
  );
  register(
    option('--remote-execution-server')
      .string()
      .advanced()
      .default(defaults.remoteExecutionServer)
      .help('host:port of the gRPC server to use as the remote execution scheduler.')
  );
  register(
    option('--remote-store-chunk-bytes')
      .int()
      .advanced()
      .default(defaults.remoteStoreChunkBytes)
      .help('Size in bytes of chunks sent to and from the remote file store.')
  );
  register(
    option('--remote-store-chunk-upload-timeout-seconds')
      .int()
      .advanced()
      .default(defaults.remoteStoreChunkUploadTimeoutSeconds)
      .help('Timeout in seconds for uploading one chunk to the remote file store.')
  );
  register(
    option('--remote-store-rpc-retries')
      .int()
      .advanced()
      .default(defaults.remoteStoreRpcRetries)
      .help('How many times to retry an RPC to the remote store before giving up.')
  );
  register(
    option('--remote-store-connection-limit')
      .int()
      .advanced()
      .default(defaults.remoteStoreConnectionLimit)
      .help('How many remote stores may hold open connections at once.')
  );
  register(
    option('--remote-execution-process-cache-namespace')
      .string()
      .advanced()
      .default(defaults.remoteExecutionProcessCacheNamespace)
      .help('Cache namespace for remote process execution. Change it to invalidate every remote result.')
  );
  register(
    option('--remote-instance-name')
      .string()
      .advanced()
      .default(defaults.remoteInstanceName)
      .help('Remote execution instance name, used for routing by both remote servers.')
  );
  register(
    option('--remote-ca-certs-path')
      .string()
      .advanced()
      .default(defaults.remoteCaCertsPath)
      .help('PEM file of CA certificates for the remote servers. Without it, TLS is not used.')
  );
  register(
    option('--remote-oauth-bearer-token-path')
      .string()
      .advanced()
      .default(defaults.remoteOauthBearerTokenPath)
      .help('File holding an OAuth token for the remote servers. Without it, no authorization is sent.')
  );
  register(
    option('--remote-execution-extra-platform-properties')
      .listOf('string')
      .advanced()
      .default([...defaults.remoteExecutionExtraPlatformProperties])
      .help('Platform properties (property=value) set on every remote execution request.')
  );
  register(
    option('--remote-execution-headers')
      .dict()
      .advanced()
      .default({ ...defaults.remoteExecutionHeaders })
      .help('Headers set on every remote execution request.')
  );
  register(
    option('--remote-execution-overall-deadline-secs')
      .int()
      .advanced()
      .default(defaults.remoteExecutionOverallDeadlineSecs)
      .help('Overall timeout in seconds for each remote execution request, counted from submission.')
  );

  // Process execution
  register(
    option('--process-execution-local-parallelism')
      .int()
      .advanced()
      .default(defaults.processExecutionLocalParallelism)
      .help('Maximum number of processes run locally at once.')
  );
  register(
    option('--process-execution-remote-parallelism')
      .int()
      .advanced()
      .default(defaults.processExecutionRemoteParallelism)
      .help('Maximum number of processes run remotely at once.')
  );
  register(
    option('--process-execution-cleanup-local-dirs')
      .bool()
      .advanced()
      .default(defaults.processExecutionCleanupLocalDirs)
      .help('Remove local sandbox directories once their process finishes. Turn off to debug.')
  );
  register(
    option('--process-execution-speculation-delay')
      .float()
      .advanced()
      .default(defaults.processExecutionSpeculationDelay)
      .help(
        'Seconds to wait before speculating a second request for a slow process. ' +
          'See --process-execution-speculation-strategy.'
      )
  );
  register(
    option('--process-execution-speculation-strategy')
      .choices(SPECULATION_STRATEGIES)
      .advanced()
      .default(defaults.processExecutionSpeculationStrategy)
      .help(
        'Start a second request for a process that has not finished within ' +
          '--process-execution-speculation-delay seconds. ' +
          '`remote_first`: run remotely, fall back to local. ' +
          '`local_first`: run locally, fall back to remote. ' +
          '`none`: never speculate.'
      )
  );
  register(
    option('--process-execution-use-local-cache')
      .bool()
      .advanced()
      .default(defaults.processExecutionUseLocalCache)
      .help('Keep process results in a local cache on disk.')
  );
  register(
    option('--process-execution-local-enable-nailgun')
      .bool()
      .advanced()
      .default(defaults.processExecutionLocalEnableNailgun)
      .help('Run processes marked as nailgunnable through a nailgun server.')
  );

  registrar.markBootstrapRegistered();
}

/**
 * Register every global option: the bootstrap set first, then the rest
 */
export function registerOptions(registrar: Registrar, environment: HostEnvironment): void {
  // Bootstrap options stay visible as ordinary global options
  registerBootstrapOptions(registrar, environment);
  const register = registrar.register.bind(registrar);

  register(
    option('--dynamic-ui')
      .bool()
      .default(!isContinuousIntegration(environment) && environment.stderrIsTty)
      .help(
        'Show a live-updating console UI while running. On by default when stderr is a ' +
          'terminal and no `CI` environment variable is set.'
      )
  );
  register(
    option('--tag')
      .listOf('string')
      .metavar('[+-]tag1,tag2,...')
      .help("Only include targets with these tags ('+' prefix, optional) or without them ('-' prefix).")
  );
  register(
    option('--exclude-target-regexp')
      .listOf('string')
      .metavar('<regexp>')
      .help('Exclude target roots that match these regexes.')
  );
  register(
    option('--build-patterns')
      .listOf('string')
      .advanced()
      .default(['BUILD', 'BUILD.*'])
      .help('File name patterns of BUILD files. To skip directories, use --build-ignore.')
  );
  register(
    option('--build-ignore')
      .listOf('string')
      .advanced()
      .help(
        'Gitignore-style patterns for paths skipped when looking for BUILD files. Other ' +
          'filesystem operations use --pants-ignore.'
      )
  );
  register(
    option('--build-file-prelude-globs')
      .listOf('string')
      .advanced()
      .help('Files whose symbols are exposed to every BUILD file.')
  );
  register(
    option('--subproject-roots')
      .listOf('string')
      .advanced()
      .help('Build roots of subprojects this project depends on.')
  );
  register(
    option('--files-not-found-behavior')
      .enumOf(FilesNotFoundBehavior)
      .advanced()
      .default('warn')
      .help(
        'What to do when files or globs named in BUILD files cannot be found, either because ' +
          'they do not exist or because --pants-ignore hides them.'
      )
  );
  register(
    option('--owners-not-found-behavior')
      .enumOf(OwnersNotFoundBehavior)
      .advanced()
      .default('error')
      .help('What to do when a file argument is not in the sources of any target.')
  );

  const loopFlag = '--loop';
  register(option(loopFlag).bool().help('Re-run goals whenever files change.'));
  register(
    option('--loop-max')
      .int()
      .advanced()
      .default(2 ** 32)
      .help(`Maximum number of iterations when ${loopFlag} is set.`)
  );
  register(
    option('--lock')
      .bool()
      .advanced()
      .default(true)
      .help('Hold a global lock during critical operations so other versions cannot run.')
  );
  register(
    option('--streaming-workunits-report-interval')
      .float()
      .advanced()
      .default(10)
      .help('Seconds between polls of streaming workunit handlers.')
  );
  register(
    option('--streaming-workunits-handlers')
      .listOf('string')
      .advanced()
      .help('Subsystems that receive streaming workunit events.')
  );

  registrar.markFullRegistered();
}
